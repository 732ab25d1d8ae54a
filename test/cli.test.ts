import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { tmpdir } from 'node:os';
import { DeviceSimulator } from '../src/simulator/device-simulator.js';

describe('CLI', () => {
  const cliSource = join(process.cwd(), 'src', 'cli.ts');
  let testDir: string;
  let simulator: DeviceSimulator;
  let port: number;

  /**
   * Execute CLI command and return stdout, stderr, and exit code
   */
  function spawnCli(args: string[]): ChildProcessWithoutNullStreams {
    return spawn(process.execPath, ['--import', 'tsx', cliSource, ...args], {
      env: { ...process.env, VLINK_CONFIG: join(testDir, 'absent.json'), VLINK_LOG_LEVEL: 'silent' },
    });
  }

  async function runCli(args: string[]): Promise<{ stdout: string; stderr: string; exitCode: number }> {
    return new Promise((resolve) => {
      const child = spawnCli(args);

      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        resolve({ stdout, stderr, exitCode: code ?? 0 });
      });
    });
  }

  before(async () => {
    testDir = mkdtempSync(join(tmpdir(), 'vlink-cli-'));
    simulator = new DeviceSimulator({ name: 'cli-sim' });
    port = await simulator.start();
  });

  after(async () => {
    await simulator.stop();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should print usage without a command', async () => {
    const result = await runCli([]);

    assert.strictEqual(result.exitCode, 1);
    assert.match(result.stderr, /^Usage: vlink <command> \[options\]/);
  });

  it('should reject unknown commands', async () => {
    const result = await runCli(['teleport']);

    assert.strictEqual(result.exitCode, 1);
    assert.match(result.stderr, /Error: Unknown command 'teleport'/);
  });

  it('should reject a bad port', async () => {
    const result = await runCli(['find', 'localhost', '--port', '99999']);

    assert.strictEqual(result.exitCode, 1);
    assert.match(result.stderr, /Invalid port number '99999'/);
  });

  describe('vlink find', () => {
    it('should require a hostname', async () => {
      const result = await runCli(['find']);

      assert.strictEqual(result.exitCode, 1);
      assert.match(result.stderr, /Missing hostname/);
    });

    it('should find the simulator by IP literal', async () => {
      const result = await runCli(['find', '127.0.0.1', '--port', String(port)]);

      assert.strictEqual(result.exitCode, 0);
      const parsed = JSON.parse(result.stdout) as { status: string; device: Record<string, unknown> };
      assert.strictEqual(parsed.status, 'found');
      assert.deepStrictEqual(
        { ...parsed.device, lastSeen: 'ignored', hardwareAddress: null },
        {
          name: 'cli-sim',
          address: '127.0.0.1',
          port,
          hostname: '127.0.0.1',
          hardwareAddress: null,
          version: '1.0.0',
          model: 'Simulated Pi',
          lastSeen: 'ignored',
        }
      );
    });

    it('should exit 1 when nothing answers', async () => {
      const closed = new DeviceSimulator();
      const closedPort = await closed.start();
      await closed.stop();

      const result = await runCli(['find', '127.0.0.1', '--port', String(closedPort)]);

      assert.strictEqual(result.exitCode, 1);
      assert.deepStrictEqual(JSON.parse(result.stdout), { status: 'not_found', hostname: '127.0.0.1' });
    });
  });
  describe('vlink discover', () => {
    it('should sweep a subnet and list the simulator', async () => {
      const configPath = join(testDir, 'discover.json');
      writeFileSync(configPath, JSON.stringify({ discovery: { reachabilityCheck: false, hostnames: [] } }));

      const result = await runCli(['discover', '--subnet', '127.0.0.0/24', '--port', String(port), '--config', configPath]);

      assert.strictEqual(result.exitCode, 0);
      const parsed = JSON.parse(result.stdout) as { count: number; devices: Record<string, unknown>[] };
      assert.strictEqual(parsed.count, 1);
      assert.strictEqual(parsed.devices[0].address, '127.0.0.1');
      assert.strictEqual(parsed.devices[0].port, port);
      assert.strictEqual(parsed.devices[0].name, 'cli-sim');
      assert.strictEqual(parsed.devices[0].hostname, null);
    });

    it('should reject a malformed subnet', async () => {
      const result = await runCli(['discover', '--subnet', 'not-a-subnet']);

      assert.strictEqual(result.exitCode, 1);
      assert.match(result.stderr, /^Error:/);
    });
  });

  describe('vlink connect', () => {
    it('should print state changes and exit cleanly on SIGTERM', async () => {
      const child = spawnCli(['connect', '127.0.0.1', '--port', String(port)]);
      const states: string[] = [];
      let buffered = '';

      const exitCode = await new Promise<number | null>((resolve) => {
        child.stdout.on('data', (data: Buffer) => {
          buffered += data.toString();
          const lines = buffered.split('\n');
          buffered = lines.pop() ?? '';
          for (const line of lines) {
            const event = JSON.parse(line) as { event: string; state?: string };
            if (event.event === 'state' && event.state) {
              states.push(event.state);
              if (event.state === 'connected') {
                child.kill('SIGTERM');
              }
            }
          }
        });
        child.on('close', (code) => resolve(code));
      });

      assert.strictEqual(exitCode, 0);
      assert.deepStrictEqual(states.slice(0, 2), ['connecting', 'connected']);
    });

    it('should exit 1 when the device refuses the connection', async () => {
      const closed = new DeviceSimulator();
      const closedPort = await closed.start();
      await closed.stop();

      const result = await runCli(['connect', '127.0.0.1', '--port', String(closedPort)]);

      assert.strictEqual(result.exitCode, 1);
      assert.match(result.stderr, new RegExp(`^Error: Could not connect to 127\\.0\\.0\\.1:${closedPort}`, 'm'));
    });
  });
});
