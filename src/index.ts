import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";

const config = loadConfig();

buildApp(config).then(async (app) => {
  await app.listen({ host: config.host, port: config.port });
  app.log.info(`routes under ${config.prefix || "/"}`);
}).catch((e) => { console.error(e); process.exit(1); });
