import { createApp } from "./app.js";
import { BatchOrchestrator } from "./execution/batch-orchestrator.js";
import { ExecutionRegistry } from "./execution/execution-registry.js";
import { ExecutionService } from "./execution/execution-service.js";
import { FailureClassifier, HeuristicFailureClassifier, HttpFailureClassifier } from "./execution/failure-classifier.js";
import { FixtureCache } from "./execution/fixture-cache.js";
import { RetryController } from "./execution/retry-controller.js";
import { RunOrchestrator } from "./execution/run-orchestrator.js";
import { HttpStepExecutor, SimulatedStepExecutor, StepExecutor } from "./execution/step-executor.js";
import { PassthroughStepResolver, StepResolver } from "./execution/step-resolver.js";
import { AppConfig } from "./lib/config.js";
import { StateCipher } from "./lib/encryption.js";
import { ExecutionStore, PostgresExecutionStore } from "./lib/execution-store.js";
import { InMemoryExecutionStore } from "./lib/memory-store.js";

export interface RuntimeOptions {
  store: ExecutionStore;
  encryptionKey: string;
  executor: StepExecutor;
  fallbackExecutor?: StepExecutor;
  classifier: FailureClassifier;
  stepResolver?: StepResolver;
  intelligentRetryEnabled?: boolean;
  batchMaxParallel?: number;
  corsAllowedOrigins?: string[];
  now?: () => Date;
}

export interface Runtime {
  store: ExecutionStore;
  fixtureCache: FixtureCache;
  runOrchestrator: RunOrchestrator;
  retryController: RetryController;
  batchOrchestrator: BatchOrchestrator;
  executionService: ExecutionService;
  registry: ExecutionRegistry;
  app: ReturnType<typeof createApp>;
}

export function createRuntime(options: RuntimeOptions): Runtime {
  const now = options.now ?? (() => new Date());
  const stepResolver = options.stepResolver ?? new PassthroughStepResolver();
  const fixtureCache = new FixtureCache({
    store: options.store,
    cipher: new StateCipher(options.encryptionKey),
    now
  });
  const runOrchestrator = new RunOrchestrator({ store: options.store, fixtureCache, now });
  const retryController = new RetryController({ runOrchestrator, classifier: options.classifier });
  const batchOrchestrator = new BatchOrchestrator({
    retryController,
    fixtureCache,
    stepResolver,
    maxParallel: options.batchMaxParallel
  });
  const registry = new ExecutionRegistry(now);
  const executionService = new ExecutionService({
    store: options.store,
    executor: options.executor,
    fallbackExecutor: options.fallbackExecutor ?? new SimulatedStepExecutor(),
    fixtureCache,
    stepResolver,
    retryController,
    batchOrchestrator,
    registry,
    maxParallel: options.batchMaxParallel
  });

  const app = createApp({
    store: options.store,
    executionService,
    fixtureCache,
    executor: options.executor,
    registry,
    intelligentRetryEnabled: options.intelligentRetryEnabled ?? false,
    corsAllowedOrigins: options.corsAllowedOrigins ?? []
  });

  return {
    store: options.store,
    fixtureCache,
    runOrchestrator,
    retryController,
    batchOrchestrator,
    executionService,
    registry,
    app
  };
}

export function createStore(config: AppConfig): ExecutionStore {
  if (config.store.kind === "postgres") {
    return new PostgresExecutionStore({
      databaseUrl: config.store.databaseUrl,
      ssl: config.store.ssl
    });
  }

  return new InMemoryExecutionStore();
}

export function createRuntimeFromConfig(config: AppConfig, store: ExecutionStore = createStore(config)): Runtime {
  return createRuntime({
    store,
    encryptionKey: config.encryptionKey,
    executor: new HttpStepExecutor({
      baseUrl: config.executorUrl,
      timeoutMs: config.executorTimeoutMs
    }),
    classifier: config.classifierUrl
      ? new HttpFailureClassifier({ baseUrl: config.classifierUrl })
      : new HeuristicFailureClassifier(),
    intelligentRetryEnabled: config.intelligentRetryEnabled,
    batchMaxParallel: config.batchMaxParallel,
    corsAllowedOrigins: config.corsAllowedOrigins
  });
}
