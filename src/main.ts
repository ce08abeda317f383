import "reflect-metadata";
import * as dotenv from "dotenv";
dotenv.config();

import { NestFactory } from "@nestjs/core";
import type { INestApplication } from "@nestjs/common";
import { FilteredLogger } from "@/common/logging/filtered-logger";
import { enabledLogLevels } from "@/common/types/logging";
import { asError } from "@/common/utils/error.utils";
import { AppModule } from "@/app.module";
import { configureApp, setupSwaggerDocumentation } from "@/app.setup";
import { ENV } from "@/config/environment.constants";

// Global application instance for graceful shutdown
let app: INestApplication | null = null;
const logger = new FilteredLogger("Bootstrap");

async function bootstrap(): Promise<void> {
  try {
    const appCreationStart = performance.now();
    app = await NestFactory.create(AppModule, {
      logger: enabledLogLevels(ENV.LOGGING.LOG_LEVEL),
    });
    logger.log(`NestJS application created in ${(performance.now() - appCreationStart).toFixed(2)}ms`);

    const basePath = ENV.APPLICATION.BASE_PATH;
    configureApp(app, basePath);
    setupSwaggerDocumentation(app, basePath);
    logger.log("API documentation configured");

    setupGracefulShutdown();

    const { HOST, PORT } = ENV.APPLICATION;
    try {
      await app.listen(PORT, HOST);
    } catch (error) {
      const errObj = asError(error);
      if (errObj.message.includes("EADDRINUSE")) {
        logger.error(`Port ${PORT} is already in use. Set APP_PORT to use a different port.`);
      }
      throw errObj;
    }

    logger.log(`HTTP server listening on http://${HOST}:${PORT}${basePath}/ (docs at ${basePath}/api-doc)`);
  } catch (error) {
    const errObj = asError(error);
    logger.fatal(`Application startup failed: ${errObj.message}`, errObj.stack);

    if (app) {
      try {
        await app.close();
      } catch (closeError) {
        logger.error("Application cleanup failed:", asError(closeError).stack);
      }
    }

    process.exit(1);
  }
}

function setupGracefulShutdown(): void {
  let isShuttingDown = false;

  const signals: NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

  signals.forEach(signal => {
    process.on(signal, () => {
      if (isShuttingDown) {
        logger.log(`Received ${signal} during shutdown, ignoring...`);
        return;
      }

      isShuttingDown = true;
      logger.log(`Received ${signal}, starting graceful shutdown...`);

      gracefulShutdown()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error(`Error during ${signal} shutdown:`, asError(error).stack);
          process.exit(1);
        });
    });
  });

  process.on("unhandledRejection", reason => {
    logger.error("Unhandled promise rejection:", asError(reason).stack);
  });
}

async function gracefulShutdown(): Promise<void> {
  if (!app) {
    return;
  }

  const closing = app.close();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new Error(`Shutdown timed out after ${ENV.TIMEOUTS.GRACEFUL_SHUTDOWN_MS}ms`)),
      ENV.TIMEOUTS.GRACEFUL_SHUTDOWN_MS
    );
  });

  try {
    // Module destroy hooks flush pending cache writes
    await Promise.race([closing, timeout]);
    logger.log("Graceful shutdown completed");
  } finally {
    clearTimeout(timer);
  }
}

void bootstrap();
