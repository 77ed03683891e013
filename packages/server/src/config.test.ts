import { describe, it, expect, afterEach } from 'vitest';
import {
  ServerOptionsSchema,
  validateServerOptions,
  validateStandaloneOptions,
} from './config.js';
import { createServerFixture, type ServerFixture } from './test-utils.js';

let fixtures: Array<ServerFixture> = [];

function trackedFixture(): ServerFixture {
  const fixture = createServerFixture();
  fixtures.push(fixture);
  return fixture;
}

afterEach(() => {
  for (const f of fixtures) f.stores.destroy();
  fixtures = [];
});

describe('validateServerOptions', () => {
  it('should keep the services and default basePath to /', () => {
    const { options, shareRegistry, ledger } = trackedFixture();
    const opts = validateServerOptions(options);

    expect(opts.shareRegistry).toBe(shareRegistry);
    expect(opts.ledger).toBe(ledger);
    expect(opts.basePath).toBe('/');
  });

  it('should strip a trailing slash from basePath', () => {
    const { options } = trackedFixture();
    const opts = validateServerOptions({ ...options, basePath: '/governance/' });
    expect(opts.basePath).toBe('/governance');
  });

  it('should reject a relative basePath', () => {
    const { options } = trackedFixture();
    expect(() =>
      validateServerOptions({ ...options, basePath: 'governance' }),
    ).toThrow('basePath must be an absolute URL path');
  });

  it('should reject something that is not a ShareRegistry', () => {
    const { options } = trackedFixture();
    expect(() =>
      ServerOptionsSchema.parse({ ...options, shareRegistry: { resolve() {} } }),
    ).toThrow('Must be a ShareRegistry instance');
  });

  it('should require a renderer for every resource type', () => {
    const { options } = trackedFixture();
    expect(() =>
      ServerOptionsSchema.parse({
        ...options,
        renderers: {
          resume: options.renderers.resume,
          cover_letter: { render: 'not a function' },
        },
      }),
    ).toThrow('Must be a PublicRenderer');
  });

  it('should require authorize to be a function', () => {
    const { options } = trackedFixture();
    expect(() =>
      ServerOptionsSchema.parse({ ...options, authorize: true }),
    ).toThrow('authorize must be a function');
  });
});

describe('validateStandaloneOptions', () => {
  it('should apply port and host defaults', () => {
    const { options } = trackedFixture();
    const opts = validateStandaloneOptions(options);
    expect(opts.port).toBe(4000);
    expect(opts.host).toBe('localhost');
  });

  it('should accept port 0 for an ephemeral port', () => {
    const { options } = trackedFixture();
    expect(validateStandaloneOptions({ ...options, port: 0 }).port).toBe(0);
  });

  it('should reject a negative port', () => {
    const { options } = trackedFixture();
    expect(() => validateStandaloneOptions({ ...options, port: -1 })).toThrow();
  });
});
