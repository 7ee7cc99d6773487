import { describe, test, expect } from "vitest";
import { AnalyzerNotFoundError, AnalyzerOutputError, AnalyzerWorkingDirectoryError } from "../../src/errors.js";
import { AnalysisRunner, FAILURE_NOTIFICATION, PROGRESS_TITLE } from "../../src/services/analysis-runner.js";
import { RunRegistry } from "../../src/services/run-registry.js";
import { defaultSettings, type YalafiSettings } from "../../src/settings.js";
import {
  FakeLauncher,
  RecordingProgress,
  createHarness,
  createMockLogger,
  flush,
  range,
  rawMatch,
  sequentialTokens,
} from "../helpers/test-factories.js";

const URI = "file:///tmp/notes/a.tex";

function target(text = "teh cat") {
  return { uri: URI, getText: () => text };
}

function output(...matches: unknown[]): string {
  return JSON.stringify({ matches });
}

describe("AnalysisRunner", () => {
  test("runs the checker on the document's file and maps its matches", async () => {
    const h = createHarness();
    const pending = h.ctx.runner.run(target());
    await flush();

    expect(h.launcher.calls).toEqual([
      {
        executable: "python3",
        args: ["-m", "yalafi.shell", "--out", "json", "/tmp/notes/a.tex"],
        cwd: "/tmp/notes",
      },
    ]);
    h.launcher.exit({ stdout: output(rawMatch()) });

    const outcome = await pending;
    expect(outcome.kind).toBe("completed");
    if (outcome.kind !== "completed") return;
    expect(outcome.run.state).toBe("completed");
    expect(outcome.diagnostics.map((d) => d.range)).toEqual([range(0, 0, 0, 3)]);
    expect(h.ctx.runs.size).toBe(0);
  });

  test("passes configured options before the file name", async () => {
    const h = createHarness({ commandLineOptions: ["--lang", "de-DE"], pythonPath: "/opt/venv/bin/python" });
    const pending = h.ctx.runner.run(target());
    await flush();
    h.launcher.exit({ stdout: output() });
    await pending;

    expect(h.launcher.calls[0]?.executable).toBe("/opt/venv/bin/python");
    expect(h.launcher.calls[0]?.args).toEqual(["-m", "yalafi.shell", "--out", "json", "--lang", "de-DE", "/tmp/notes/a.tex"]);
  });

  test("reports progress through every stage", async () => {
    const h = createHarness();
    const pending = h.ctx.runner.run(target());
    await flush();
    h.launcher.exit({ stdout: output() });
    await pending;

    expect(h.progress.events).toEqual([
      { kind: "create", token: "run-1" },
      { kind: "begin", token: "run-1", title: PROGRESS_TITLE, message: "Run YaLafi", cancellable: true },
      { kind: "report", token: "run-1", message: "Parse result" },
      { kind: "report", token: "run-1", message: "Create Diagnostics" },
      { kind: "end", token: "run-1", message: "Finished" },
    ]);
  });

  test("maps against the text as it was when the checker started", async () => {
    const h = createHarness();
    let text = "teh cat";
    const pending = h.ctx.runner.run({ uri: URI, getText: () => text });
    await flush();
    text = "new first line\nteh cat";
    h.launcher.exit({ stdout: output(rawMatch()) });

    const outcome = await pending;
    expect(outcome.kind === "completed" && outcome.diagnostics[0]?.range).toEqual(range(0, 0, 0, 3));
  });

  test("keeps well-formed matches when one is malformed", async () => {
    const h = createHarness();
    const pending = h.ctx.runner.run(target());
    await flush();
    h.launcher.exit({ stdout: output({ offset: 0 }, rawMatch()) });

    const outcome = await pending;
    expect(outcome.kind === "completed" && outcome.diagnostics).toHaveLength(1);
    expect(h.logger.warn).toHaveBeenCalledWith(
      "[diagnostics] skipping malformed match: Expected matches[0].rule to be of type object.",
    );
  });

  test("fails with one notification on a non-zero exit", async () => {
    const h = createHarness();
    const pending = h.ctx.runner.run(target());
    await flush();
    h.launcher.exit({ exitCode: 2, stderr: "usage: shell.py [-h]\nerror: bad option" });

    const outcome = await pending;
    expect(outcome.kind).toBe("failed");
    expect(h.notifier.showErrorMessage).toHaveBeenCalledTimes(1);
    expect(h.notifier.showErrorMessage).toHaveBeenCalledWith(FAILURE_NOTIFICATION);
    expect(h.progress.ends()).toEqual(["Failed"]);
    expect(h.logger.error).toHaveBeenCalledWith("[check] Exit code: 2");
    expect(h.logger.error).toHaveBeenCalledWith(
      '[check] Command was:\n    ["python3", "-m", "yalafi.shell", "--out", "json", "/tmp/notes/a.tex"]',
    );
    expect(h.logger.error).toHaveBeenCalledWith("[check] Stderr:\n    usage: shell.py [-h]\n    error: bad option");
  });

  test("fails when the interpreter is missing", async () => {
    const h = createHarness();
    const pending = h.ctx.runner.run(target());
    await flush();
    h.launcher.fail(new AnalyzerNotFoundError("python3"));

    const outcome = await pending;
    expect(outcome.kind === "failed" && outcome.error).toBeInstanceOf(AnalyzerNotFoundError);
    expect(h.logger.error).toHaveBeenCalledWith("[check] Could not run YaLafi because python3 was not found.");
    expect(h.notifier.showErrorMessage).toHaveBeenCalledTimes(1);
  });

  test("logs a missing document folder as its own cause", async () => {
    const h = createHarness();
    const pending = h.ctx.runner.run(target());
    await flush();
    h.launcher.fail(new AnalyzerWorkingDirectoryError("/tmp/notes"));

    expect((await pending).kind).toBe("failed");
    expect(h.logger.error).toHaveBeenCalledWith("[check] Could not run YaLafi because the folder /tmp/notes does not exist.");
    expect(h.notifier.showErrorMessage).toHaveBeenCalledTimes(1);
  });

  test("fails when stdout is not JSON", async () => {
    const h = createHarness();
    const pending = h.ctx.runner.run(target());
    await flush();
    h.launcher.exit({ stdout: "Traceback (most recent call last):" });

    const outcome = await pending;
    expect(outcome.kind === "failed" && outcome.error).toBeInstanceOf(AnalyzerOutputError);
    expect(outcome.kind === "failed" && outcome.run.state).toBe("failed");
    expect(h.progress.ends()).toEqual(["Failed"]);
  });

  test("ends as cancelled without notifying when the client cancels", async () => {
    const h = createHarness();
    const pending = h.ctx.runner.run(target());
    await flush();
    expect(h.ctx.runs.cancel("run-1")).toBe(true);

    const outcome = await pending;
    expect(outcome.kind).toBe("cancelled");
    expect(h.launcher.pending).toBe(0);
    expect(h.progress.ends()).toEqual(["Cancelled"]);
    expect(h.notifier.showErrorMessage).not.toHaveBeenCalled();
  });

  test("does not spawn when cancelled while settings are being fetched", async () => {
    let release: (settings: YalafiSettings) => void = () => {};
    const launcher = new FakeLauncher();
    const progress = new RecordingProgress();
    const registry = new RunRegistry(sequentialTokens());
    const runner = new AnalysisRunner({
      registry,
      launcher,
      progress,
      notifier: { showErrorMessage: () => {} },
      logger: createMockLogger(),
      settings: () =>
        new Promise<YalafiSettings>((resolve) => {
          release = resolve;
        }),
    });

    const pending = runner.run(target());
    await flush();
    registry.cancel("run-1");
    release(defaultSettings());

    expect((await pending).kind).toBe("cancelled");
    expect(launcher.calls).toEqual([]);
    expect(progress.ends()).toEqual(["Cancelled"]);
  });

  test("a second run for the same document supersedes the first", async () => {
    const h = createHarness();
    const first = h.ctx.runner.run(target());
    await flush();
    const second = h.ctx.runner.run(target());
    await flush();

    expect((await first).kind).toBe("cancelled");
    expect(h.launcher.pending).toBe(1);
    h.launcher.exit({ stdout: output(rawMatch()) });
    expect((await second).kind).toBe("completed");
    expect(h.progress.events.filter((e) => e.kind === "end")).toEqual([
      { kind: "end", token: "run-1", message: "Cancelled" },
      { kind: "end", token: "run-2", message: "Finished" },
    ]);
    expect(h.notifier.showErrorMessage).not.toHaveBeenCalled();
  });

  test("skips documents that are not files", async () => {
    const h = createHarness();
    const outcome = await h.ctx.runner.run({ uri: "untitled:Untitled-1", getText: () => "teh" });
    expect(outcome).toEqual({ kind: "skipped", reason: "not a file document" });
    expect(h.launcher.calls).toEqual([]);
    expect(h.progress.events).toEqual([]);
  });
});
