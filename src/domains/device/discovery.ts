import { SerialPort } from 'serialport';

export interface PortEntry {
  path: string;
  manufacturer?: string;
}

export type PortLister = () => Promise<PortEntry[]>;

/** USB-serial adapters first, then native UARTs */
export const CANDIDATE_PREFIXES = ['/dev/ttyUSB', '/dev/ttyACM', '/dev/ttyS'] as const;

function prefixRank(path: string): number {
  return CANDIDATE_PREFIXES.findIndex(prefix => path.startsWith(prefix));
}

function portNumber(path: string): number {
  const match = /(\d+)$/.exec(path);
  return match ? Number(match[1]) : 0;
}

/**
 * Serial ports the gripper board could be attached to, ordered so that the
 * most likely candidate comes first.
 */
export async function listCandidatePorts(lister: PortLister = () => SerialPort.list()): Promise<PortEntry[]> {
  const ports = await lister();
  return ports
    .filter(port => prefixRank(port.path) >= 0)
    .sort((a, b) => prefixRank(a.path) - prefixRank(b.path) || portNumber(a.path) - portNumber(b.path));
}
