import { getCallbackMaxAttempts, getWebhookTimeoutMs } from "../../config";
import { type UnitOfWork } from "../../db/unitOfWork";
import { getDbFailureCategory } from "../../dbRuntime";
import { describeError, logError, logInfo, logWarn } from "../../observability/logger";
import { defaultFetch, readErrorBody, type FetchLike } from "../../utils/http";
import { withAbortTimeout } from "../../utils/withTimeout";
import { isTerminalJobStatus, type ParsingJob } from "../jobs/jobs.types";
import { buildCompletionPayload } from "./webhooks.payload";

export type DeliveryFailureReason =
  | "job_not_found"
  | "operator_not_found"
  | "http_error"
  | "network_error"
  | "internal_error"
  | "already_claimed";

export type DeliveryResult =
  | { jobId: string; delivered: true; httpStatus: number }
  | { jobId: string; delivered: false; reason: DeliveryFailureReason; httpStatus: number | null };

export type WebhookServiceDeps = {
  uow: UnitOfWork;
  fetch?: FetchLike;
  timeoutMs?: number;
};

export type SendCompletionOptions = {
  /**
   * Attempt count the caller last saw. The send goes ahead only while the stored
   * counter still matches, so a sweep that already took the attempt wins.
   */
  expectedAttempts?: number;
};

export type WebhookService = {
  /** Claims one delivery attempt, then posts the completion payload. Never throws. */
  sendCompletion(jobId: string, options?: SendCompletionOptions): Promise<DeliveryResult>;
  retryFailedCallbacks(maxAttempts?: number): Promise<number>;
  deliverPendingCallbacks(): Promise<number>;
};

export function createWebhookService(deps: WebhookServiceDeps): WebhookService {
  const { uow } = deps;
  const fetchImpl = deps.fetch ?? defaultFetch;

  async function markCallback(jobId: string, status: "SENT" | "FAILED"): Promise<void> {
    try {
      await uow.jobs.updateCallbackStatus(jobId, status);
    } catch (error) {
      logError("omr_callback_status_update_failed", {
        jobId,
        callbackStatus: status,
        error: describeError(error),
        category: getDbFailureCategory(error),
      });
    }
  }

  async function post(url: string, body: string): Promise<{ ok: boolean; status: number; message: string }> {
    const timeoutMs = deps.timeoutMs ?? getWebhookTimeoutMs();
    return withAbortTimeout(
      async (signal) => {
        const response = await fetchImpl(url, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body,
          signal,
        });
        const message = response.ok ? "" : await readErrorBody(response);
        return { ok: response.ok, status: response.status, message };
      },
      timeoutMs,
      "webhook delivery"
    );
  }

  // `job` must come from a successful claim; the caller owns this attempt.
  async function deliver(job: ParsingJob): Promise<DeliveryResult> {
    const jobId = job.id;
    try {
      const operator = await uow.operators.findById(job.operatorId);
      if (!operator) {
        logError("omr_callback_operator_missing", { jobId, operatorId: job.operatorId });
        return { jobId, delivered: false, reason: "operator_not_found", httpStatus: null };
      }
      const sheets = await uow.sheets.findByJob(jobId);
      const body = JSON.stringify(buildCompletionPayload(job, sheets));

      let response: { ok: boolean; status: number; message: string };
      try {
        response = await post(operator.callbackUrl, body);
      } catch (error) {
        logWarn("omr_callback_failed", {
          jobId,
          callbackUrl: operator.callbackUrl,
          reason: "network_error",
          error: describeError(error),
        });
        await markCallback(jobId, "FAILED");
        return { jobId, delivered: false, reason: "network_error", httpStatus: null };
      }

      if (!response.ok) {
        logWarn("omr_callback_failed", {
          jobId,
          callbackUrl: operator.callbackUrl,
          reason: "http_error",
          httpStatus: response.status,
          body: response.message,
        });
        await markCallback(jobId, "FAILED");
        return { jobId, delivered: false, reason: "http_error", httpStatus: response.status };
      }

      await markCallback(jobId, "SENT");
      logInfo("omr_callback_sent", {
        jobId,
        callbackUrl: operator.callbackUrl,
        httpStatus: response.status,
      });
      return { jobId, delivered: true, httpStatus: response.status };
    } catch (error) {
      logError("omr_callback_error", {
        jobId,
        error: describeError(error),
        category: getDbFailureCategory(error),
      });
      await markCallback(jobId, "FAILED");
      return { jobId, delivered: false, reason: "internal_error", httpStatus: null };
    }
  }

  async function sendCompletion(jobId: string, options: SendCompletionOptions = {}): Promise<DeliveryResult> {
    let job: ParsingJob | null;
    let claimed: ParsingJob | null = null;
    try {
      job = await uow.jobs.findById(jobId);
      if (job) {
        claimed = await uow.jobs.claimCallbackDelivery(
          jobId,
          options.expectedAttempts ?? job.callbackAttempts
        );
      }
    } catch (error) {
      logError("omr_callback_error", {
        jobId,
        error: describeError(error),
        category: getDbFailureCategory(error),
      });
      return { jobId, delivered: false, reason: "internal_error", httpStatus: null };
    }
    if (!job) {
      logError("omr_callback_job_missing", { jobId });
      return { jobId, delivered: false, reason: "job_not_found", httpStatus: null };
    }
    if (!claimed) {
      logInfo("omr_callback_skipped", { jobId, reason: "already_claimed" });
      return { jobId, delivered: false, reason: "already_claimed", httpStatus: null };
    }
    return deliver(claimed);
  }

  return {
    sendCompletion,

    async retryFailedCallbacks(maxAttempts = getCallbackMaxAttempts()) {
      const failed = await uow.jobs.findByCallbackStatus("FAILED");
      const eligible = failed.filter(
        (job) => isTerminalJobStatus(job.status) && job.callbackAttempts < maxAttempts
      );

      let delivered = 0;
      for (const job of eligible) {
        // Another pass that already took this attempt leaves the counter moved and the claim empty.
        const claimed = await uow.jobs.claimCallbackAttempt(job.id, job.callbackAttempts);
        if (!claimed) {
          continue;
        }
        const result = await deliver(claimed);
        if (result.delivered) {
          delivered += 1;
        }
      }

      logInfo("omr_callback_retry_pass", {
        candidates: failed.length,
        eligible: eligible.length,
        delivered,
        maxAttempts,
      });
      return delivered;
    },

    async deliverPendingCallbacks() {
      const pending = await uow.jobs.findPendingCallbacks();
      let delivered = 0;
      for (const job of pending) {
        const result = await sendCompletion(job.id, { expectedAttempts: job.callbackAttempts });
        if (result.delivered) {
          delivered += 1;
        }
      }
      if (pending.length > 0) {
        logInfo("omr_callback_pending_pass", { pending: pending.length, delivered });
      }
      return delivered;
    },
  };
}
