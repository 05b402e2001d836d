import type { Application } from "../../core/app";
import type { Plugin } from "../../core/plugin";
import type { AppConfig } from "../config/config";
import type { LinkFactory } from "../device/drivers/types";
import type { Logger } from "../observability/types";
import { LinkSession } from "../session/session";
import { GripperController } from "./gripper";

export interface GripperPluginOptions {
  config: AppConfig;
  /** Serial device path, already resolved */
  path: string;
  linkFactory: LinkFactory;
  logger: Logger;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class GripperPlugin implements Plugin {
  name = "gripper";
  private session?: LinkSession;
  private controller?: GripperController;
  private readonly logger: Logger;

  constructor(private readonly options: GripperPluginOptions) {
    this.logger = options.logger.child({ component: "GripperPlugin" });
  }

  setup(app: Application): void {
    const { config, path, linkFactory, logger } = this.options;
    this.session = new LinkSession(linkFactory, { ...config.link, path }, logger.child({ component: "LinkSession" }));
    this.controller = new GripperController(this.session, config.gripper, logger.child({ component: "Gripper" }));

    this.session.events.on("reader:stopped", ({ error }) => {
      this.logger.error("Lost the serial link", error, { path });
    });

    app.registerService("session", this.session);
    app.registerService("gripper", this.controller);
  }

  async start(): Promise<void> {
    const session = this.session;
    const controller = this.controller;
    if (!session || !controller) return;

    await session.connect();
    try {
      await this.greet(session, controller);
    } catch (e) {
      await session.disconnect();
      throw e;
    }
  }

  async stop(): Promise<void> {
    await this.session?.disconnect();
  }

  private async greet(session: LinkSession, controller: GripperController): Promise<void> {
    // 开发板上电复位后需要一段时间才能响应
    await sleep(this.options.config.link.startupDelayMs);
    const bootLines = session.getBufferedLines();
    if (bootLines.length > 0) {
      this.logger.debug("Discarded boot output", { lines: bootLines.length });
    }

    if (await controller.probe()) {
      this.logger.info("Gripper board is responding", { path: this.options.path });
    } else {
      this.logger.warn("Gripper board did not answer the probe; commands may time out", { path: this.options.path });
    }
  }
}
