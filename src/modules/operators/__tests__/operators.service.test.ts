import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createJobService } from "../../jobs/jobs.service";
import { countRows, createTestStore, type TestStore } from "../../../test/db";
import { createOperatorService, type OperatorService } from "../operators.service";

describe("operator service", () => {
  let store: TestStore;
  let service: OperatorService;

  beforeEach(async () => {
    store = await createTestStore();
    service = createOperatorService({ uow: store.uow });
  });

  afterEach(async () => {
    await store.pool.end();
  });

  it("provisions an operator with a generated token", async () => {
    const operator = await service.provisionOperator({ callbackUrl: "https://grader.test/hook" });

    expect(operator.callbackUrl).toBe("https://grader.test/hook");
    expect(operator.token).toMatch(/^[0-9a-f-]{36}$/);
    expect(await service.getOperator(operator.id)).toEqual(operator);
  });

  it("authenticates by token", async () => {
    const operator = await service.provisionOperator({
      callbackUrl: "https://grader.test/hook",
      token: "test-secret-token",
    });

    expect((await service.authenticate("test-secret-token"))?.id).toBe(operator.id);
    expect(await service.authenticate("unknown-token")).toBeNull();
    expect(await service.authenticate("   ")).toBeNull();
  });

  it("refuses a token that is already taken", async () => {
    await service.provisionOperator({ callbackUrl: "https://a.test/hook", token: "test-secret-token" });

    await expect(
      service.provisionOperator({ callbackUrl: "https://b.test/hook", token: "test-secret-token" })
    ).rejects.toMatchObject({ code: "operator_token_taken", status: 409 });
  });

  it("rejects a callback URL that is not http", async () => {
    await expect(service.provisionOperator({ callbackUrl: "ftp://grader.test/hook" })).rejects.toMatchObject({
      code: "validation_error",
    });
  });

  it("updates the callback URL", async () => {
    const operator = await service.provisionOperator({ callbackUrl: "https://old.test/hook" });

    const updated = await service.updateCallbackUrl(operator.id, "https://new.test/hook");

    expect(updated.callbackUrl).toBe("https://new.test/hook");
    expect(updated.token).toBe(operator.token);
    await expect(service.updateCallbackUrl("missing", "https://new.test/hook")).rejects.toMatchObject({
      code: "operator_not_found",
    });
  });

  it("deletes an operator together with its jobs", async () => {
    const operator = await service.provisionOperator({ callbackUrl: "https://grader.test/hook" });
    await createJobService({ uow: store.uow }).createJob(operator.id, [{ id: "s1", locator: "/scans/1.png" }]);

    expect(await service.deleteOperator(operator.id)).toBe(true);
    expect(await service.deleteOperator(operator.id)).toBe(false);
    expect(await service.listOperators()).toEqual([]);
    expect(await countRows(store.pool, "omr_sheets")).toBe(0);
  });
});
