import { describe, it, expect } from 'vitest';
import { listCandidatePorts } from './discovery';

describe('listCandidatePorts', () => {
  it('keeps serial adapters and orders them', async () => {
    const ports = await listCandidatePorts(async () => [
      { path: '/dev/ttyS1' },
      { path: '/dev/ttyUSB10' },
      { path: '/dev/ttyACM0', manufacturer: 'Espressif' },
      { path: '/dev/ttyUSB2' },
      { path: '/dev/cu.Bluetooth-Incoming-Port' },
      { path: 'COM3' },
    ]);

    expect(ports.map(p => p.path)).toEqual(['/dev/ttyUSB2', '/dev/ttyUSB10', '/dev/ttyACM0', '/dev/ttyS1']);
    expect(ports[2]?.manufacturer).toBe('Espressif');
  });

  it('returns an empty list when nothing is attached', async () => {
    await expect(listCandidatePorts(async () => [])).resolves.toEqual([]);
  });
});
