#!/usr/bin/env node
import "reflect-metadata";
import { InjectorService } from "@tsed/di";
import { $log } from "@tsed/logger";
import { LOG_LEVEL } from "./config";
import { SessionController } from "./controllers/SessionController";
import { SchemaService } from "./services/SchemaService";
import { createShutdown } from "./shutdown";

$log.level = LOG_LEVEL;

async function bootstrap() {
  const injector = new InjectorService();

  const shutdown = createShutdown(injector);

  try {
    await injector.load();

    injector.invoke<SchemaService>(SchemaService).initialize();

    process.on("SIGINT", () => void shutdown(0));
    process.on("SIGTERM", () => void shutdown(0));

    await injector.invoke<SessionController>(SessionController).run();
    await shutdown(0);
  } catch (error) {
    $log.error("Fatal error:", error);
    await shutdown(1);
  }
}

void bootstrap();
