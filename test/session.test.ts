import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createDevice } from '../src/discovery/device.js';
import { DiscoverySession } from '../src/discovery/session.js';

describe('DiscoverySession', () => {
  it('should keep one entry per address and port', () => {
    const session = new DiscoverySession();

    assert.strictEqual(session.add(createDevice({ address: '10.0.0.42', port: 8000 })), true);
    assert.strictEqual(session.add(createDevice({ address: '10.0.0.42', port: 8000 })), false);
    assert.strictEqual(session.add(createDevice({ address: '10.0.0.42', port: 8001 })), true);

    assert.strictEqual(session.size, 2);
  });

  it('should upgrade an entry to one that carries a hostname', () => {
    const session = new DiscoverySession();
    session.add(createDevice({ address: '10.0.0.42', port: 8000 }));
    session.add(createDevice({ address: '10.0.0.42', port: 8000, hostname: 'raspberrypi.local' }));

    assert.strictEqual(session.get('10.0.0.42:8000')?.hostname, 'raspberrypi.local');
  });

  it('should not downgrade an entry that has a hostname', () => {
    const session = new DiscoverySession();
    session.add(createDevice({ address: '10.0.0.42', port: 8000, hostname: 'raspberrypi.local' }));
    session.add(createDevice({ address: '10.0.0.42', port: 8000 }));

    assert.strictEqual(session.get('10.0.0.42:8000')?.hostname, 'raspberrypi.local');
  });

  it('should keep a known hostname when updating', () => {
    const session = new DiscoverySession();
    session.add(createDevice({ address: '10.0.0.42', port: 8000, hostname: 'raspberrypi.local' }));

    const stored = session.update(
      createDevice({ address: '10.0.0.42', port: 8000, capabilities: { name: 'pi', version: '1' } })
    );

    assert.strictEqual(stored?.hostname, 'raspberrypi.local');
    assert.strictEqual(stored?.capabilities?.name, 'pi');
    assert.strictEqual(session.get('10.0.0.42:8000'), stored);
  });

  it('should ignore updates for unknown devices', () => {
    const session = new DiscoverySession();
    assert.strictEqual(session.update(createDevice({ address: '10.0.0.42', port: 8000 })), null);
    assert.strictEqual(session.size, 0);
  });

  it('should refuse changes once completed', () => {
    const session = new DiscoverySession();
    session.add(createDevice({ address: '10.0.0.42', port: 8000 }));

    const devices = session.complete();

    assert.strictEqual(devices.length, 1);
    assert.strictEqual(session.isCompleted, true);
    assert.throws(() => session.add(createDevice({ address: '10.0.0.43', port: 8000 })), {
      message: 'Discovery session already completed',
    });
    assert.throws(() => session.complete(), { message: 'Discovery session already completed' });
  });
});
