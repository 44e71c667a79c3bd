#!/usr/bin/env node
import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import { ConversionCliService } from "../../conversion/conversion-cli.service";
import { CONFIG_KEYS } from "../../conversion/config";
import { CliExitCode } from "../../conversion/errors";
import { AppModule } from "./app.module";
import { resolveLogLevels } from "./log-levels";

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: resolveLogLevels(process.env[CONFIG_KEYS.LOG_LEVEL]),
  });

  // .env has been loaded by now
  const configService = app.get(ConfigService);
  app.useLogger(
    resolveLogLevels(configService.get<string>(CONFIG_KEYS.LOG_LEVEL)),
  );

  try {
    const cli = app.get(ConversionCliService);
    process.exitCode = await cli.run(process.argv.slice(2));
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  new Logger("ccd2iso").error(
    error instanceof Error ? error.message : String(error),
    error instanceof Error ? error.stack : undefined,
  );
  process.exitCode = CliExitCode.FAILURE;
});
