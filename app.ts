import "dotenv/config";
import { logger } from "./src/utils/logger";
import { NutritionApplication } from "./src/main";
import { createApp } from "./src/server";

const application = new NutritionApplication();

application
  .initialize()
  .then((deps) => {
    const app = createApp(deps, application.config);
    const port = application.config.port;
    const server = app.listen(port, () =>
      logger.info(`Nutrition Log service listening on port ${port}`)
    );

    const stop = () => {
      server.close(() => {
        application
          .shutdown()
          .then(() => process.exit(0))
          .catch((err) => {
            logger.error("Shutdown failed", err);
            process.exit(1);
          });
      });
    };
    process.on("SIGINT", stop);
    process.on("SIGTERM", stop);
  })
  .catch((err) => {
    logger.error("Failed to initialize application:", err);
    process.exit(1);
  });
