import { describe, it, expect, beforeEach } from 'vitest';
import type { ShareLink } from '@tokengate/core';
import { InMemoryShareLinkStore } from './in-memory-share-link-store.js';

function makeLink(overrides: Partial<ShareLink> = {}): ShareLink {
  return {
    token: 'token-a',
    resourceType: 'resume',
    resourceId: 'resume-1',
    ownerId: 'owner-1',
    createdAt: new Date(1_000),
    expiresAt: new Date(10_000),
    revokedAt: null,
    lastAccessedAt: null,
    ...overrides,
  };
}

describe('InMemoryShareLinkStore', () => {
  let store: InMemoryShareLinkStore;

  beforeEach(() => {
    store = new InMemoryShareLinkStore();
  });

  describe('createIfNoActive', () => {
    it('should insert a link when the resource has none', async () => {
      const result = await store.createIfNoActive(makeLink(), 1_000);

      expect(result).toEqual({ status: 'created', link: makeLink() });
      await expect(store.findByToken('token-a')).resolves.toEqual(makeLink());
    });

    it('should return the active link instead of inserting another', async () => {
      await store.createIfNoActive(makeLink(), 1_000);

      const result = await store.createIfNoActive(
        makeLink({ token: 'token-b' }),
        2_000,
      );

      expect(result).toEqual({ status: 'existing', link: makeLink() });
      await expect(store.findByToken('token-b')).resolves.toBeUndefined();
    });

    it('should insert a new link once the previous one expired', async () => {
      await store.createIfNoActive(makeLink(), 1_000);

      const result = await store.createIfNoActive(
        makeLink({ token: 'token-b', expiresAt: new Date(30_000) }),
        10_000,
      );

      expect(result.status).toBe('created');
      expect(store.size()).toBe(2);
    });

    it('should report a token conflict without writing', async () => {
      await store.createIfNoActive(makeLink(), 1_000);
      await store.revokeAll('resume', 'resume-1', new Date(2_000));

      const result = await store.createIfNoActive(
        makeLink({ resourceId: 'resume-2' }),
        3_000,
      );

      expect(result).toEqual({ status: 'token_conflict' });
      await expect(
        store.listByResource('resume', 'resume-2'),
      ).resolves.toEqual([]);
    });

    it('should let only one of many concurrent creates win', async () => {
      const results = await Promise.all(
        Array.from({ length: 10 }, (_, i) =>
          store.createIfNoActive(makeLink({ token: `token-${i}` }), 1_000),
        ),
      );

      const tokens = new Set(
        results.map((r) => (r.status === 'token_conflict' ? '' : r.link.token)),
      );
      expect(tokens).toEqual(new Set(['token-0']));
      expect(results.filter((r) => r.status === 'created')).toHaveLength(1);
    });
  });

  describe('findActive', () => {
    it('should ignore revoked and expired links', async () => {
      await store.createIfNoActive(makeLink(), 1_000);

      await expect(
        store.findActive('resume', 'resume-1', 5_000),
      ).resolves.toEqual(makeLink());
      await expect(
        store.findActive('resume', 'resume-1', 10_000),
      ).resolves.toBeUndefined();

      await store.revokeAll('resume', 'resume-1', new Date(2_000));
      await expect(
        store.findActive('resume', 'resume-1', 5_000),
      ).resolves.toBeUndefined();
    });

    it('should keep resource types apart', async () => {
      await store.createIfNoActive(makeLink(), 1_000);

      await expect(
        store.findActive('cover_letter', 'resume-1', 1_000),
      ).resolves.toBeUndefined();
    });
  });

  describe('revokeAll', () => {
    it('should count only links it changed', async () => {
      await store.createIfNoActive(makeLink(), 1_000);

      await expect(
        store.revokeAll('resume', 'resume-1', new Date(2_000)),
      ).resolves.toBe(1);
      await expect(
        store.revokeAll('resume', 'resume-1', new Date(3_000)),
      ).resolves.toBe(0);
      expect((await store.findByToken('token-a'))?.revokedAt).toEqual(
        new Date(2_000),
      );
    });

    it('should return 0 for a resource with no links', async () => {
      await expect(
        store.revokeAll('resume', 'missing', new Date(2_000)),
      ).resolves.toBe(0);
    });
  });

  describe('listByResource', () => {
    it('should list every link newest first', async () => {
      await store.createIfNoActive(makeLink(), 1_000);
      await store.revokeAll('resume', 'resume-1', new Date(2_000));
      await store.createIfNoActive(
        makeLink({ token: 'token-b', createdAt: new Date(3_000) }),
        3_000,
      );

      const links = await store.listByResource('resume', 'resume-1');

      expect(links.map((link) => link.token)).toEqual(['token-b', 'token-a']);
    });
  });

  describe('touch', () => {
    it('should record the access time', async () => {
      await store.createIfNoActive(makeLink(), 1_000);

      await store.touch('token-a', new Date(4_000));

      expect((await store.findByToken('token-a'))?.lastAccessedAt).toEqual(
        new Date(4_000),
      );
    });

    it('should ignore unknown tokens', async () => {
      await expect(
        store.touch('missing', new Date(4_000)),
      ).resolves.toBeUndefined();
    });
  });

  it('should hand out copies', async () => {
    await store.createIfNoActive(makeLink(), 1_000);

    const link = await store.findByToken('token-a');
    link?.expiresAt?.setTime(0);

    expect((await store.findByToken('token-a'))?.expiresAt).toEqual(
      new Date(10_000),
    );
  });
});
