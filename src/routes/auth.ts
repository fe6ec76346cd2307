import { Router, Request, Response } from "express";
import { dummyLoginSchema, loginSchema, parse, registerSchema } from "../schemas";
import { IdentityService } from "../services/identityService";

export function createAuthRoutes(identity: IdentityService): Router {
  const router = Router();

  router.post('/dummyLogin', (req: Request, res: Response) => {
    const { role } = parse(dummyLoginSchema, req.body);
    const { token } = identity.dummyLogin(role);
    res.status(200).json({ token });
  });

  router.post('/register', (req: Request, res: Response) => {
    const { email, password, role } = parse(registerSchema, req.body);
    const { account, token } = identity.register(email, password, role);
    res.status(201).json({ id: account.id, email: account.email, role: account.role, token });
  });

  router.post('/login', (req: Request, res: Response) => {
    const { email, password } = parse(loginSchema, req.body);
    const { token } = identity.login(email, password);
    res.status(200).json({ token });
  });

  return router;
}
