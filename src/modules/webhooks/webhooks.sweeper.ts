import { getCallbackMaxAttempts, getCallbackSweepIntervalMs } from "../../config";
import { describeError, logError } from "../../observability/logger";
import { type WebhookService } from "./webhooks.service";

export type CallbackSweeperOptions = {
  intervalMs?: number;
  maxAttempts?: number;
};

export type CallbackSweeper = {
  /** Runs one pass now unless a pass is already in progress. */
  tick: () => Promise<void>;
  stop: () => void;
};

export function startCallbackSweeper(
  webhookService: Pick<WebhookService, "deliverPendingCallbacks" | "retryFailedCallbacks">,
  options: CallbackSweeperOptions = {}
): CallbackSweeper {
  const intervalMs = options.intervalMs ?? getCallbackSweepIntervalMs();
  const maxAttempts = options.maxAttempts ?? getCallbackMaxAttempts();

  let stopped = false;
  let running = false;

  const tick = async () => {
    if (stopped || running) {
      return;
    }
    running = true;
    try {
      await webhookService.deliverPendingCallbacks();
      await webhookService.retryFailedCallbacks(maxAttempts);
    } catch (error) {
      logError("omr_callback_sweep_failed", { error: describeError(error) });
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    void tick();
  }, intervalMs);

  const stop = () => {
    stopped = true;
    clearInterval(timer);
    process.removeListener("SIGTERM", stop);
  };

  process.on("SIGTERM", stop);

  return { tick, stop };
}
