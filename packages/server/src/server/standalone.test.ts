import { describe, it, expect, afterEach } from 'vitest';
import { createServerFixture, type ServerFixture } from '../test-utils.js';
import { startServer, type StandaloneServer } from './standalone.js';

describe('startServer', () => {
  let running: StandaloneServer | undefined;
  let fixture: ServerFixture | undefined;

  afterEach(async () => {
    if (running) {
      await running.close();
      running = undefined;
    }
    fixture?.stores.destroy();
    fixture = undefined;
  });

  it('should start a server and respond to health check', async () => {
    fixture = createServerFixture();
    running = await startServer({
      ...fixture.options,
      port: 0, // Random available port
      host: '127.0.0.1',
    });

    const addr = running.server.address();
    const port = typeof addr === 'object' && addr ? addr.port : 0;

    expect(running.url).toBe(`http://127.0.0.1:${port}`);

    const res = await fetch(`${running.url}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('should be closable', async () => {
    fixture = createServerFixture();
    const started = await startServer({
      ...fixture.options,
      port: 0,
      host: '127.0.0.1',
    });

    await started.close();
    expect(started.server.listening).toBe(false);
  });

  it('should reject when the port is taken', async () => {
    fixture = createServerFixture();
    running = await startServer({
      ...fixture.options,
      port: 0,
      host: '127.0.0.1',
    });
    const addr = running.server.address();
    const port = typeof addr === 'object' && addr ? addr.port : 0;

    await expect(
      startServer({ ...fixture.options, port, host: '127.0.0.1' }),
    ).rejects.toThrow('EADDRINUSE');
  });
});
