import { buildApp } from "./app.js";
import { getConfig } from "./config.js";

const config = getConfig();
const { app } = await buildApp(config);

try {
  await app.listen({ port: config.PORT, host: config.HOST });
  app.log.info(`crewforge API running on ${config.HOST}:${config.PORT}`);
} catch (err) {
  app.log.error(err);
  process.exit(1);
}

export { app };
