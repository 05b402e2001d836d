import type { AppConfig } from '../config/config';
import type { Logger } from '../observability/types';
import { createMockGripperScenario } from './drivers/mock-gripper';
import { MockSerialLink } from './drivers/mock-serial';
import { NativeSerialLink } from './drivers/serial';
import type { LinkFactory } from './drivers/types';

// 模拟模式下的默认设备路径
export const MOCK_PORT_PATH = 'mock://gripper';

/**
 * Pick the link implementation for the configured mode: the simulated
 * firmware in mock mode, the serial port otherwise.
 */
export function createLinkFactory(config: AppConfig, logger: Logger): LinkFactory {
  if (config.mock) {
    return (path) => {
      logger.info('Using simulated gripper firmware', { path });
      return new MockSerialLink(
        path,
        createMockGripperScenario({ angleMin: config.gripper.angleMin, angleMax: config.gripper.angleMax }),
        logger.child({ component: 'MockSerialLink' }),
      );
    };
  }
  return (path) => new NativeSerialLink(path, logger.child({ component: 'NativeSerialLink' }));
}
