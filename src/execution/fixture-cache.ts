import { StateCipher } from "../lib/encryption.js";
import { ExecutionStore } from "../lib/execution-store.js";
import { logInfo, logWarn, serializeError } from "../lib/logging.js";
import {
  CAPTURE_STATE_ACTION,
  Fixture,
  FixtureCacheEntry,
  RESTORE_STATE_ACTION,
  TestStep
} from "../types.js";

export const RESTORED_STATE_PLACEHOLDER = "[cached browser state]";

export interface FixtureResolution {
  executableSteps: TestStep[];
  /** Parallel to `executableSteps`; cached state is replaced by a placeholder. */
  displaySteps: TestStep[];
  cacheHit: boolean;
  /** Cache-scoped fixtures whose state the capture step should persist. Empty on a hit. */
  captureFixtures: Fixture[];
}

export interface SaveFixtureStateInput {
  fixtureId: string;
  projectId: string;
  browser: string | null;
  url: string | null;
  state: unknown;
  ttlSeconds: number;
}

export interface FixtureCacheOptions {
  store: ExecutionStore;
  cipher: StateCipher;
  now?: () => Date;
}

export class FixtureCache {
  private readonly store: ExecutionStore;
  private readonly cipher: StateCipher;
  private readonly now: () => Date;

  constructor(options: FixtureCacheOptions) {
    this.store = options.store;
    this.cipher = options.cipher;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Produces the fixture prefix for a test. The first cache-scoped fixture
   * with valid state short-circuits resolution: the restore step replaces
   * every declared fixture.
   */
  async resolve(fixtureIds: string[], browser: string | null): Promise<FixtureResolution> {
    const fixtures: Fixture[] = [];

    for (const fixtureId of fixtureIds) {
      const fixture = await this.store.getFixture(fixtureId);
      if (!fixture) {
        logWarn("fixture_cache.fixture_missing", { fixtureId });
        continue;
      }

      if (fixture.scope === "cached") {
        const restored = await this.restore(fixture, browser);
        if (restored) {
          return restored;
        }
      }

      fixtures.push(fixture);
    }

    const executableSteps: TestStep[] = fixtures.flatMap((fixture) =>
      fixture.setupSteps.map((step) => ({ ...step, fixtureName: fixture.name }))
    );
    const captureFixtures = fixtures.filter((fixture) => fixture.scope === "cached");

    if (captureFixtures.length > 0) {
      executableSteps.push({
        action: CAPTURE_STATE_ACTION,
        target: null,
        value: null,
        description: "Capture browser state for caching",
        fixtureName: captureFixtures.map((fixture) => fixture.name).join(", "),
        hidden: true
      });
    }

    return {
      executableSteps,
      displaySteps: executableSteps.map((step) => ({ ...step })),
      cacheHit: false,
      captureFixtures
    };
  }

  async save(input: SaveFixtureStateInput): Promise<FixtureCacheEntry> {
    const capturedAt = this.now();
    const expiresAt = new Date(capturedAt.getTime() + input.ttlSeconds * 1000);

    const entry = await this.store.upsertFixtureCacheEntry({
      fixtureId: input.fixtureId,
      projectId: input.projectId,
      browser: input.browser,
      url: input.url,
      encryptedState: this.cipher.encrypt(JSON.stringify(input.state ?? null)),
      capturedAt: capturedAt.toISOString(),
      expiresAt: expiresAt.toISOString()
    });

    logInfo("fixture_cache.saved", {
      fixtureId: input.fixtureId,
      browser: input.browser,
      expiresAt: entry.expiresAt
    });

    return entry;
  }

  async getValidEntry(fixtureId: string, browser: string | null): Promise<FixtureCacheEntry | null> {
    const entries = await this.store.findValidFixtureCacheEntries(fixtureId, browser, this.now().toISOString());
    return entries[0] ?? null;
  }

  async invalidate(fixtureId: string): Promise<number> {
    const removed = await this.store.deleteFixtureCacheEntries(fixtureId);
    logInfo("fixture_cache.invalidated", { fixtureId, removed });
    return removed;
  }

  private async restore(fixture: Fixture, browser: string | null): Promise<FixtureResolution | null> {
    const entries = await this.store.findValidFixtureCacheEntries(fixture.id, browser, this.now().toISOString());

    for (const entry of entries) {
      let state: string;
      try {
        state = this.cipher.decrypt(entry.encryptedState);
      } catch (error) {
        logWarn("fixture_cache.decrypt_failed", {
          fixtureId: fixture.id,
          entryId: entry.id,
          error: serializeError(error)
        });
        continue;
      }

      const restoreStep: TestStep = {
        action: RESTORE_STATE_ACTION,
        target: entry.url,
        value: state,
        description: `Restore cached state for fixture "${fixture.name}"`,
        fixtureName: fixture.name
      };

      logInfo("fixture_cache.hit", { fixtureId: fixture.id, browser, entryId: entry.id });

      return {
        executableSteps: [restoreStep],
        displaySteps: [{ ...restoreStep, value: RESTORED_STATE_PLACEHOLDER }],
        cacheHit: true,
        captureFixtures: []
      };
    }

    return null;
  }
}
