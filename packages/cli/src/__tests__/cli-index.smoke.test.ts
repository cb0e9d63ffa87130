import { describe, it, expect, vi, beforeAll } from 'vitest';

// Mock commander to avoid real CLI execution side-effects
class FakeCommand {
  name(): this {
    return this;
  }
  description(): this {
    return this;
  }
  argument(): this {
    return this;
  }
  version(): this {
    return this;
  }
  command(): this {
    return this;
  }
  option(): this {
    return this;
  }
  requiredOption(): this {
    return this;
  }
  action(): this {
    return this;
  }
  parseAsync(): Promise<this> {
    return Promise.resolve(this);
  }
}

vi.mock('commander', () => ({ Command: FakeCommand }));

// Avoid accidental process.exit when error paths are exercised
beforeAll(() => {
  vi.spyOn(process, 'exit').mockImplementation(((code?: number) => {
    throw new Error(`process.exit(${code ?? 0}) intercepted in tests`);
  }) as never);
});

describe('CLI index smoke: imports without executing actions', () => {
  it('imports CLI module successfully with mocked commander', async () => {
    // Dynamic import builds the command tree against the mocked Command
    const mod = await import('../index.js');
    expect(mod.program).toBeInstanceOf(FakeCommand);
    await expect(mod.main(['node', 'peanotrace'])).resolves.toBeUndefined();
  });
});
