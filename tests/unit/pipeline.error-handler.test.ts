import {
  classifyDispatchFailure,
  failureOutcome,
  PipelineError,
  stageFailureCode
} from "../../src/application/pipeline/pipeline.error-handler";
import { MissingColumnsError } from "../../src/core/records/featureProjection";
import { StageTimeoutError } from "../../src/shared/timeout/withTimeout";

describe("pipeline error handler", () => {
  it("keeps pipeline errors as they are", () => {
    const error = new PipelineError({ code: "ModelNotFound", message: "Model m not found" });

    expect(classifyDispatchFailure(error)).toBe(error);
    expect(error).toBeInstanceOf(PipelineError);
    expect(error.status).toBe(500);
    expect(error.context).toEqual({});
  });

  it("maps missing columns to a 400", () => {
    const classified = classifyDispatchFailure(new MissingColumnsError(["humidity"]), { key: "a.csv" });

    expect(classified.code).toBe("MissingColumns");
    expect(classified.status).toBe(400);
    expect(classified.message).toBe("Missing required columns in input data: humidity");
    expect(classified.context).toEqual({ key: "a.csv" });
  });

  it("falls back to the given code and keeps the root cause", () => {
    const root = new Error("socket hang up");
    const wrapped = new Error("submit failed", { cause: root });

    const classified = classifyDispatchFailure(wrapped, {}, "DispatchFailed");

    expect(classified.code).toBe("DispatchFailed");
    expect(classified.message).toBe("submit failed");
    expect(classified.cause).toBe(root);
  });

  it("uses BatchTransformInitiationFailed by default and accepts non-errors", () => {
    const classified = classifyDispatchFailure("quota exceeded");

    expect(classified.code).toBe("BatchTransformInitiationFailed");
    expect(classified.message).toBe("quota exceeded");
    expect(classified.cause).toBe("quota exceeded");
  });

  it("builds failure outcomes from any reason", () => {
    expect(failureOutcome("WriteFailed", new Error("deadlock"))).toEqual({
      kind: "failure",
      error: "WriteFailed",
      cause: "deadlock"
    });
  });

  it("tells stage timeouts apart from stage failures", () => {
    const codes = { failed: "WriteFailed", timeout: "WriteTimeout" } as const;

    expect(stageFailureCode(new StageTimeoutError("Write stage", 10), codes)).toBe("WriteTimeout");
    expect(stageFailureCode(new Error("deadlock"), codes)).toBe("WriteFailed");
  });
});
