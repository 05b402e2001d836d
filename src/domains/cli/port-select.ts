import type { AppConfig } from '../config/config';
import { listCandidatePorts, type PortLister } from '../device/discovery';
import { MOCK_PORT_PATH } from '../device/manager';
import type { MenuIO } from './menu';

/**
 * Decide which serial device to open: the configured path, the simulated
 * board in mock mode, the only candidate found, or the user's pick.
 * Null when nothing usable was found or chosen.
 */
export async function resolvePortPath(config: AppConfig, io: MenuIO, lister?: PortLister): Promise<string | null> {
  if (config.link.path) return config.link.path;
  if (config.mock) return MOCK_PORT_PATH;

  const ports = await listCandidatePorts(lister);
  const [first] = ports;
  if (!first) {
    io.print('No serial ports found (looked for /dev/ttyUSB*, /dev/ttyACM*, /dev/ttyS*).');
    return null;
  }
  if (ports.length === 1) {
    io.print(`Using ${first.path}`);
    return first.path;
  }

  io.print('Serial ports:');
  ports.forEach((port, i) => io.print(`  ${i + 1}. ${port.path}${port.manufacturer ? ` (${port.manufacturer})` : ''}`));

  for (;;) {
    const answer = await io.question(`Select a port [1-${ports.length}]: `);
    if (answer === null) return null;
    const choice = ports[Number(answer.trim()) - 1];
    if (choice && /^\d+$/.test(answer.trim())) return choice.path;
    io.print(`Enter a number between 1 and ${ports.length}.`);
  }
}
