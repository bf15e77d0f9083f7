import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";
import { createLogger } from "./infra/logger.js";

const config = loadRuntimeConfig();
const logger = createLogger(config.logLevel);
for (const name of config.ignoredOverrides) {
  logger.warn({ variable: name }, "ignoring non-integer decision threshold override");
}

const app = buildApp(config);

app
  .listen({ port: config.port, host: config.host })
  .then(() => {
    logger.info(
      {
        reject_at: config.risk.scoreToDecision.rejectAt,
        review_at: config.risk.scoreToDecision.reviewAt,
      },
      `risk engine API listening on http://${config.host}:${config.port}`,
    );
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, "failed to start risk engine API");
    process.exit(1);
  });
