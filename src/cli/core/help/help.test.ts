import { describe, expect, it, vi } from 'vitest';

describe('help.ts', () => {
  it('re-exports showHelp from formatter', async () => {
    vi.resetModules();

    const helpMod = await import('./help.ts');
    const formatterMod = await import('./formatter.ts');

    expect(helpMod.showHelp).toBe(formatterMod.showHelp);
  });

  it('builds showVersion from getPackageVersion', async () => {
    vi.resetModules();
    vi.doMock('../version/version.ts', () => ({
      getPackageVersion: () => '9.9.9',
    }));

    try {
      const { showVersion } = await import('./help.ts');
      expect(showVersion()).toBe('ci-decision-engine v9.9.9');
    } finally {
      vi.doUnmock('../version/version.ts');
      vi.resetModules();
    }
  });
});
