#!/usr/bin/env node
import readline from "readline/promises";
import { Application } from "./core/app";
import { createReadlineIO, runMenu } from "./domains/cli/menu";
import { resolvePortPath } from "./domains/cli/port-select";
import { loadConfig } from "./domains/config/config";
import { createLinkFactory } from "./domains/device/manager";
import { GripperPlugin } from "./domains/gripper/gripper.plugin";
import { createRootLogger } from "./domains/observability/logger";

// Bootstrap the application
async function bootstrap(): Promise<number> {
  // Config errors are reported before the configured logger exists
  const config = await loadConfig({ logger: createRootLogger({ level: "warn" }) });
  const logger = createRootLogger({ level: config.log.level, format: config.log.format });

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const io = createReadlineIO(rl);
  const app = new Application(logger.child({ component: "Core" }));

  let inputClosed = false;
  rl.once("close", () => {
    inputClosed = true;
  });
  const closeInput = () => {
    if (!inputClosed) rl.close();
  };

  let stopping: Promise<void> | null = null;
  const shutdown = () => {
    stopping ??= app.stop().finally(closeInput);
    return stopping;
  };

  // readline turns Ctrl-C into SIGINT on the interface
  rl.on("SIGINT", closeInput);
  process.once("SIGTERM", () => {
    shutdown().catch((e: unknown) => logger.error("Shutdown failed", e));
  });

  try {
    const path = await resolvePortPath(config, io);
    if (!path) return 1;

    await app.use(new GripperPlugin({
      config,
      path,
      linkFactory: createLinkFactory(config, logger),
      logger,
    }));
    await app.start();

    await runMenu(app.getService("gripper"), io, {
      defaultMoveTimeMs: config.gripper.defaultMoveTimeMs,
      logger,
    });
    return 0;
  } catch (error) {
    logger.error("Gripper host failed", error);
    return 1;
  } finally {
    await shutdown();
  }
}

bootstrap().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("Failed to start application:", error);
    process.exitCode = 1;
  },
);
