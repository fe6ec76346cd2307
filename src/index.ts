import app from "./app";
import { loadConfig } from "./config";

const { PORT } = loadConfig();

app.listen(PORT, () => {
  console.log(`PVZ service running on port ${PORT}`);
});
