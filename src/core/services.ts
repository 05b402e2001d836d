import type { GripperController } from "../domains/gripper/gripper";
import type { LinkSession } from "../domains/session/session";

/** Services plugins register on the application, by name. */
export interface ServiceMap {
  session: LinkSession;
  gripper: GripperController;
}

export type ServiceName = keyof ServiceMap;
