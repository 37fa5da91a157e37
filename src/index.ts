import app from "./app";
import { config } from "./config/env";
import { connectRedis } from "./config/redis";

const start = async () => {
  await connectRedis();

  app.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
  });
};

start().catch((error) => {
  console.error("Startup Error:", error);
  process.exit(1);
});
