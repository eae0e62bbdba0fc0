import {
  assertEnv,
  getCallbackMaxAttempts,
  getCallbackSweepEnabled,
  getCallbackSweepIntervalMs,
  getOmrEngineUrl,
} from "./config";
import { createDbPool } from "./db";
import { createOrchestrator, type Orchestrator } from "./index";
import { runMigrations } from "./migrations";
import { createHttpOmrEngine } from "./modules/processing/processing.engine";
import { createImageSource } from "./modules/processing/processing.images";
import { startCallbackSweeper, type CallbackSweeper } from "./modules/webhooks/webhooks.sweeper";
import { describeError, logError, logInfo } from "./observability/logger";

export type RunningService = {
  orchestrator: Orchestrator;
  sweeper: CallbackSweeper | null;
  shutdown: () => Promise<void>;
};

/** Migrates the database, wires the orchestrator and starts the callback sweeper when enabled. */
export async function startService(): Promise<RunningService> {
  assertEnv();
  const engineUrl = getOmrEngineUrl();
  if (!engineUrl) {
    throw new Error("missing_env:OMR_ENGINE_URL");
  }

  const pool = createDbPool();
  const applied = await runMigrations(pool);
  logInfo("service_migrations_checked", { applied: applied.length });

  const orchestrator = createOrchestrator({
    pool,
    engine: createHttpOmrEngine({ url: engineUrl }),
    imageSource: createImageSource(),
  });

  const sweeper = getCallbackSweepEnabled()
    ? startCallbackSweeper(orchestrator.webhooks, {
        intervalMs: getCallbackSweepIntervalMs(),
        maxAttempts: getCallbackMaxAttempts(),
      })
    : null;

  logInfo("service_started", { callbackSweeper: sweeper !== null });

  return {
    orchestrator,
    sweeper,
    async shutdown() {
      sweeper?.stop();
      await orchestrator.close();
      logInfo("service_stopped");
    },
  };
}

if (require.main === module) {
  startService()
    .then((service) => {
      const onSignal = () => {
        service.shutdown().catch((error: unknown) => {
          logError("service_shutdown_failed", { error: describeError(error) });
          process.exitCode = 1;
        });
      };
      process.once("SIGTERM", onSignal);
      process.once("SIGINT", onSignal);
    })
    .catch((error: unknown) => {
      logError("service_start_failed", { error: describeError(error) });
      process.exitCode = 1;
    });
}
