import { INestApplicationContext, LogLevel } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";

/**
 * Start the standalone application context.
 *
 * Initialization errors (e.g. an invalid HOLIDAY_SOURCE) reject the
 * returned promise instead of aborting the process.
 */
export function createAppContext(
  logger: LogLevel[] | false,
): Promise<INestApplicationContext> {
  return NestFactory.createApplicationContext(AppModule, {
    logger,
    abortOnError: false,
  });
}
