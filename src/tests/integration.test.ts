import request from "supertest";
import { Express } from "express";
import { createApp } from "../app";
import { Store, ReceptionStatus } from "../models/store";

describe("PVZ Service Endpoints", () => {
  let app: Express;

  beforeEach(() => {
    app = createApp(new Store());
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  async function tokenFor(role: string): Promise<string> {
    const res = await request(app).post("/dummyLogin").send({ role }).expect(200);
    return res.body.token;
  }

  async function createPvz(token: string, city = "Москва"): Promise<string> {
    const res = await request(app)
      .post("/pvz")
      .set("Authorization", `Bearer ${token}`)
      .send({ city })
      .expect(201);
    return res.body.id;
  }

  describe("Auth", () => {
    test("dummyLogin accepts the two roles only", async () => {
      await request(app).post("/dummyLogin").send({ role: "employee" }).expect(200);
      await request(app).post("/dummyLogin").send({ role: "moderator" }).expect(200);
      const res = await request(app).post("/dummyLogin").send({ role: "invalid" }).expect(400);
      expect(res.body.error).toBe("InvalidRole");
    });

    test("registering the same email twice returns 201 then 400", async () => {
      const body = { email: "employee@example.com", password: "test-password", role: "employee" };
      const first = await request(app).post("/register").send(body).expect(201);
      expect(first.body.email).toBe("employee@example.com");
      expect(first.body.role).toBe("employee");
      expect(typeof first.body.id).toBe("string");

      const second = await request(app).post("/register").send(body).expect(400);
      expect(second.body.error).toBe("DuplicateEmail");
    });

    test("login returns a usable token and rejects a wrong password", async () => {
      await request(app)
        .post("/register")
        .send({ email: "mod@example.com", password: "test-password", role: "moderator" })
        .expect(201);

      const res = await request(app)
        .post("/login")
        .send({ email: "mod@example.com", password: "test-password" })
        .expect(200);
      await createPvz(res.body.token);

      const denied = await request(app)
        .post("/login")
        .send({ email: "mod@example.com", password: "wrong" })
        .expect(401);
      expect(denied.body.error).toBe("InvalidCredentials");
    });

    test("missing or unknown bearer tokens get 401", async () => {
      const missing = await request(app).get("/pvz").expect(401);
      expect(missing.headers["www-authenticate"]).toBe("Bearer");
      expect(missing.body.error).toBe("Unauthenticated");

      await request(app).get("/pvz").set("Authorization", "Bearer unknown").expect(401);
    });

    test("oversized bodies get 413 instead of a server error", async () => {
      const errorLog = jest.spyOn(console, "error").mockImplementation(() => undefined);
      const res = await request(app)
        .post("/dummyLogin")
        .send({ role: "employee", pad: "x".repeat(200000) })
        .expect(413);
      expect(res.body.error).toBe("PayloadTooLargeError");
      expect(errorLog).not.toHaveBeenCalled();
    });

    test("malformed bodies are rejected", async () => {
      const res = await request(app).post("/register").send({ email: "x@example.com" }).expect(400);
      expect(res.body.error).toBe("ValidationError");
    });
  });

  describe("Pickup Points", () => {
    test("only moderators create pickup points, in listed cities", async () => {
      const moderator = await tokenFor("moderator");
      const employee = await tokenFor("employee");

      const created = await request(app)
        .post("/pvz")
        .set("Authorization", `Bearer ${moderator}`)
        .send({ city: "Казань" })
        .expect(201);
      expect(created.body.city).toBe("Казань");

      await request(app)
        .post("/pvz")
        .set("Authorization", `Bearer ${employee}`)
        .send({ city: "Казань" })
        .expect(403);

      const invalid = await request(app)
        .post("/pvz")
        .set("Authorization", `Bearer ${moderator}`)
        .send({ city: "Новосибирск" })
        .expect(400);
      expect(invalid.body.error).toBe("InvalidCity");
    });

    test("moderators get 403 on employee routes whatever the body", async () => {
      const moderator = await tokenFor("moderator");
      await request(app).post("/products").set("Authorization", `Bearer ${moderator}`).send({}).expect(403);
      await request(app).post("/receptions").set("Authorization", `Bearer ${moderator}`).send({}).expect(403);
    });

    test("empty or lone date bounds return the unfiltered list", async () => {
      const moderator = await tokenFor("moderator");
      const employee = await tokenFor("employee");
      const pvzId = await createPvz(moderator);
      await request(app).post("/receptions").set("Authorization", `Bearer ${employee}`).send({ pvzId }).expect(201);

      const empty = await request(app)
        .get("/pvz")
        .query({ startDate: "", endDate: "" })
        .set("Authorization", `Bearer ${employee}`)
        .expect(200);
      expect(empty.body[0].receptions).toHaveLength(1);

      const lone = await request(app)
        .get("/pvz")
        .query({ startDate: "yesterday" })
        .set("Authorization", `Bearer ${employee}`)
        .expect(200);
      expect(lone.body[0].receptions).toHaveLength(1);

      const future = await request(app)
        .get("/pvz")
        .query({ startDate: "2100-01-01", endDate: "2100-12-31" })
        .set("Authorization", `Bearer ${employee}`)
        .expect(200);
      expect(future.body[0].receptions).toEqual([]);

      await request(app)
        .get("/pvz")
        .query({ startDate: "yesterday", endDate: "2100-12-31" })
        .set("Authorization", `Bearer ${employee}`)
        .expect(400);
    });

    test("listing paginates and rejects out of range limits", async () => {
      const moderator = await tokenFor("moderator");
      const ids = [await createPvz(moderator), await createPvz(moderator), await createPvz(moderator)];

      const second = await request(app)
        .get("/pvz")
        .query({ page: 2, limit: 2 })
        .set("Authorization", `Bearer ${moderator}`)
        .expect(200);
      expect(second.body.map((s: { pvz: { id: string } }) => s.pvz.id)).toEqual([ids[2]]);

      const beyond = await request(app)
        .get("/pvz")
        .query({ page: 5, limit: 2 })
        .set("Authorization", `Bearer ${moderator}`)
        .expect(200);
      expect(beyond.body).toEqual([]);

      await request(app)
        .get("/pvz")
        .query({ limit: 31 })
        .set("Authorization", `Bearer ${moderator}`)
        .expect(400);
      await request(app)
        .get("/pvz")
        .query({ page: 0 })
        .set("Authorization", `Bearer ${moderator}`)
        .expect(400);
    });
  });

  describe("Receptions and Products", () => {
    test("full intake scenario", async () => {
      const moderator = await tokenFor("moderator");
      const employee = await tokenFor("employee");
      const pvzId = await createPvz(moderator, "Казань");

      const reception = await request(app)
        .post("/receptions")
        .set("Authorization", `Bearer ${employee}`)
        .send({ pvzId })
        .expect(201);
      expect(reception.body.status).toBe(ReceptionStatus.IN_PROGRESS);
      expect(reception.body.pvzId).toBe(pvzId);

      const types = ["электроника", "одежда"];
      for (let i = 0; i < 50; i++) {
        await request(app)
          .post("/products")
          .set("Authorization", `Bearer ${employee}`)
          .send({ type: types[i % 2], pvzId })
          .expect(201);
      }

      const listing = await request(app)
        .get("/pvz")
        .set("Authorization", `Bearer ${employee}`)
        .expect(200);
      expect(listing.body).toHaveLength(1);
      expect(listing.body[0].receptions).toHaveLength(1);
      expect(listing.body[0].receptions[0].reception.id).toBe(reception.body.id);
      expect(listing.body[0].receptions[0].products).toHaveLength(50);

      const closed = await request(app)
        .post(`/pvz/${pvzId}/close_last_reception`)
        .set("Authorization", `Bearer ${employee}`)
        .expect(200);
      expect(closed.body.status).toBe(ReceptionStatus.CLOSED);

      const add = await request(app)
        .post("/products")
        .set("Authorization", `Bearer ${employee}`)
        .send({ type: "обувь", pvzId })
        .expect(400);
      expect(add.body.error).toBe("NoOpenReception");

      const del = await request(app)
        .post(`/pvz/${pvzId}/delete_last_product`)
        .set("Authorization", `Bearer ${employee}`)
        .expect(400);
      expect(del.body.error).toBe("NoOpenReception");

      await request(app)
        .post(`/pvz/${pvzId}/close_last_reception`)
        .set("Authorization", `Bearer ${employee}`)
        .expect(400);
    });

    test("a second open reception is a conflict", async () => {
      const moderator = await tokenFor("moderator");
      const employee = await tokenFor("employee");
      const pvzId = await createPvz(moderator);

      await request(app).post("/receptions").set("Authorization", `Bearer ${employee}`).send({ pvzId }).expect(201);
      const res = await request(app)
        .post("/receptions")
        .set("Authorization", `Bearer ${employee}`)
        .send({ pvzId })
        .expect(400);
      expect(res.body.error).toBe("ConflictOpenReceptionExists");

      await request(app).post("/receptions").set("Authorization", `Bearer ${moderator}`).send({ pvzId }).expect(403);
      await request(app).post("/receptions").set("Authorization", `Bearer ${employee}`).send({ pvzId: "missing" }).expect(404);
    });

    test("delete_last_product removes the newest product first", async () => {
      const moderator = await tokenFor("moderator");
      const employee = await tokenFor("employee");
      const pvzId = await createPvz(moderator);
      await request(app).post("/receptions").set("Authorization", `Bearer ${employee}`).send({ pvzId }).expect(201);

      const first = await request(app)
        .post("/products")
        .set("Authorization", `Bearer ${employee}`)
        .send({ type: "электроника", pvzId })
        .expect(201);
      const second = await request(app)
        .post("/products")
        .set("Authorization", `Bearer ${employee}`)
        .send({ type: "обувь", pvzId })
        .expect(201);

      let res = await request(app)
        .post(`/pvz/${pvzId}/delete_last_product`)
        .set("Authorization", `Bearer ${employee}`)
        .expect(200);
      expect(res.body.message).toBe("Product deleted");
      expect(res.body.product.id).toBe(second.body.id);

      res = await request(app)
        .post(`/pvz/${pvzId}/delete_last_product`)
        .set("Authorization", `Bearer ${employee}`)
        .expect(200);
      expect(res.body.product.id).toBe(first.body.id);

      res = await request(app)
        .post(`/pvz/${pvzId}/delete_last_product`)
        .set("Authorization", `Bearer ${employee}`)
        .expect(400);
      expect(res.body.error).toBe("NoProducts");

      await request(app)
        .post(`/pvz/missing/delete_last_product`)
        .set("Authorization", `Bearer ${employee}`)
        .expect(404);
    });

    test("invalid product type is rejected", async () => {
      const moderator = await tokenFor("moderator");
      const employee = await tokenFor("employee");
      const pvzId = await createPvz(moderator);
      await request(app).post("/receptions").set("Authorization", `Bearer ${employee}`).send({ pvzId }).expect(201);

      const res = await request(app)
        .post("/products")
        .set("Authorization", `Bearer ${employee}`)
        .send({ type: "invalid", pvzId })
        .expect(400);
      expect(res.body.error).toBe("InvalidProductType");
    });

    test("metrics are exposed without auth", async () => {
      const moderator = await tokenFor("moderator");
      const employee = await tokenFor("employee");
      const pvzId = await createPvz(moderator);
      await request(app).post("/receptions").set("Authorization", `Bearer ${employee}`).send({ pvzId }).expect(201);
      await request(app)
        .post("/products")
        .set("Authorization", `Bearer ${employee}`)
        .send({ type: "обувь", pvzId })
        .expect(201);

      const res = await request(app).get("/metrics").expect(200);
      const lines = res.text.split("\n");
      expect(lines).toContain("pvz_created_total 1");
      expect(lines).toContain("receptions_created_total 1");
      expect(lines).toContain("products_added_total 1");
      expect(lines).toContain('request_count{method="POST",endpoint="/pvz",http_status="201"} 1');
      expect(lines).toContain('request_count{method="POST",endpoint="/dummyLogin",http_status="200"} 2');
    });

    test("health reports store counts", async () => {
      const res = await request(app).get("/health").expect(200);
      expect(res.body).toEqual({ status: "healthy", pickupPoints: 0, receptions: 0, products: 0 });
    });
  });
});
