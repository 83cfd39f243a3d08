describe("run-pipeline CLI", () => {
  const envSnapshot = { ...process.env };

  afterEach(() => {
    process.env = { ...envSnapshot };
    jest.resetModules();
    jest.restoreAllMocks();
  });

  it("builds a controlled error envelope without stack by default", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/run-pipeline");

    const error = Object.assign(new Error("write failed"), {
      name: "PipelineError",
      code: "WriteFailed",
      context: { executionId: "exec-1", key: "predicted_values_output/a.csv", records: 10, unsafe: "ignored" },
      status: 500,
      cause: { raw: "secret payload" }
    });

    const envelope = buildCliErrorEnvelope(error, false);

    expect(envelope).toEqual({
      event: "pipeline.failed",
      name: "PipelineError",
      message: "write failed",
      code: "WriteFailed",
      context: { executionId: "exec-1", key: "predicted_values_output/a.csv", records: 10 },
      status: 500
    });
    expect(JSON.stringify(envelope)).not.toContain("secret payload");
  });

  it("includes stack only when debug mode is enabled", async () => {
    const { buildCliErrorEnvelope, isDebugMode } = await import("../../src/cli/run-pipeline");

    expect(buildCliErrorEnvelope(new Error("boom"), true).stack).toContain("Error: boom");
    expect(isDebugMode({ DEBUG: "true" })).toBe(true);
    expect(isDebugMode({ DEBUG: "0" })).toBe(false);
  });

  it.each([
    [["--duration-hours", "6"], {}, 6],
    [["--duration-hours=12"], {}, 12],
    [[], { DURATION_HOURS: "48" }, 48],
    [[], {}, 24]
  ])("reads the lookback from %p and %p", async (argv, env, expected) => {
    const { readDurationHours } = await import("../../src/cli/run-pipeline");

    expect(readDurationHours(argv, env)).toBe(expected);
  });

  it("rejects a missing or out-of-range duration", async () => {
    const { readDurationHours } = await import("../../src/cli/run-pipeline");

    expect(() => readDurationHours(["--duration-hours"], {})).toThrow("--duration-hours requires a value");
    expect(() => readDurationHours(["--duration-hours=0"], {})).toThrow(
      "duration-hours=0 is out of allowed range [1..8760]"
    );
  });

  it("runs one execution and logs how it finished", async () => {
    const runPipeline = jest.fn().mockResolvedValue({
      executionId: "exec-1",
      stage: "Done",
      outcome: { statusCode: 200 }
    });
    jest.doMock("../../src/composition/root", () => ({ runPipeline }));
    const logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);

    const { executePipelineCli } = await import("../../src/cli/run-pipeline");
    await executePipelineCli(["--duration-hours", "6"]);

    expect(runPipeline).toHaveBeenCalledWith(6);
    expect(logSpy).toHaveBeenCalledWith(
      JSON.stringify({ event: "pipeline.finished", executionId: "exec-1", stage: "Done", statusCode: 200 })
    );
  });

  it("logs a sanitized envelope and exits with code 1 when the execution failed", async () => {
    process.env = { ...envSnapshot, DEBUG: "0" };
    const runPipeline = jest.fn().mockResolvedValue({
      executionId: "exec-1",
      stage: "JobFailed",
      outcome: { statusCode: 500, errorCode: "BatchTransformFailed", errorDetail: "Failed" }
    });
    jest.doMock("../../src/composition/root", () => ({ runPipeline }));

    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const exitSpy = jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

    const { executePipelineCli } = await import("../../src/cli/run-pipeline");
    await expect(executePipelineCli([])).rejects.toThrow("EXIT:1");

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0]))).toEqual({
      event: "pipeline.failed",
      name: "PipelineError",
      message: "Failed",
      code: "BatchTransformFailed",
      context: { executionId: "exec-1" },
      status: 500
    });
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("exits with code 1 when the pipeline cannot start", async () => {
    process.env = { ...envSnapshot, DEBUG: "0" };
    jest.doMock("../../src/composition/root", () => ({
      runPipeline: jest.fn().mockRejectedValue(new Error("MONGO_URI unreachable"))
    }));
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

    const { executePipelineCli } = await import("../../src/cli/run-pipeline");
    await expect(executePipelineCli([])).rejects.toThrow("EXIT:1");

    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0]))).toEqual({
      event: "pipeline.failed",
      name: "Error",
      message: "MONGO_URI unreachable"
    });
  });
});
