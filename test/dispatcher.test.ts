import { describe, expect, it } from "vitest";
import { fileArg, literal } from "../src/associations/template.js";
import { defaultConfig } from "../src/config/schema.js";
import { DebounceGuard } from "../src/dispatch/debounce.js";
import { Dispatcher, isExcluded, isPristine, openedMessage } from "../src/dispatch/dispatcher.js";
import type { Confirmer } from "../src/host/types.js";
import type { LaunchWithConfig } from "../src/types.js";
import {
  FakeBuffer,
  FakeLauncher,
  ManualClock,
  RecordingNotifier,
  RecordingRecentFiles,
  ScriptedConfirmer,
  silentLogger,
} from "./helpers.js";

const pdfOnly: LaunchWithConfig = {
  enabled: true,
  confirm: false,
  launcher: "shell",
  associations: [{ pattern: /\.pdf$/, program: "acroread", args: [fileArg] }],
  exclusions: [],
};

const findFile = (path: string) => ({ path, triggerId: "find-file" });

function setup(
  config: Partial<LaunchWithConfig> = {},
  confirmer: Confirmer = new ScriptedConfirmer(true),
) {
  const clock = new ManualClock(100_000);
  const guard = new DebounceGuard({ windowMs: 2000 });
  const launcher = new FakeLauncher();
  const notifier = new RecordingNotifier();
  const recent = new RecordingRecentFiles();
  const dispatcher = new Dispatcher({
    config: { ...pdfOnly, ...config },
    guard,
    launcher,
    confirmer,
    notifier,
    recentFiles: recent,
    logger: silentLogger,
    now: clock.now,
  });
  return { clock, guard, launcher, notifier, recent, dispatcher };
}

describe("Dispatcher", () => {
  it("launches the matching program for a pdf", async () => {
    const { dispatcher, launcher, notifier, recent } = setup();

    const result = await dispatcher.handle({ path: "report.pdf", triggerId: "find-file" });

    expect(result).toEqual({
      status: "handled",
      invocation: { program: "acroread", args: ["report.pdf"], file: "report.pdf" },
    });
    expect(launcher.calls).toEqual([
      { program: "acroread", args: ["report.pdf"], file: "report.pdf" },
    ]);
    expect(notifier.messages).toEqual(["Opened report.pdf in external program"]);
    expect(recent.files).toEqual(["report.pdf"]);
  });

  it("passes through a file the default table does not know", async () => {
    const { dispatcher, launcher, notifier } = setup({
      associations: defaultConfig().associations,
    });

    const result = await dispatcher.handle({ path: "notes.txt", triggerId: "find-file" });

    expect(result).toEqual({ status: "not_handled", reason: "no_match" });
    expect(launcher.calls).toHaveLength(0);
    expect(notifier.messages).toHaveLength(0);
  });

  it("substitutes the path into a mixed template", async () => {
    const { dispatcher, launcher } = setup({
      associations: [{ pattern: /\.avi$/, program: "mplayer", args: [literal("-idx"), fileArg] }],
    });

    await dispatcher.handle({ path: "/a/b.avi", triggerId: "find-file" });

    expect(launcher.calls[0]?.args).toEqual(["-idx", "/a/b.avi"]);
  });

  it("ignores a second open inside the debounce window", async () => {
    const { dispatcher, clock, launcher } = setup();
    const event = { path: "report.pdf", triggerId: "find-file" };

    expect((await dispatcher.handle(event)).status).toBe("handled");
    clock.advance(1000);
    expect(await dispatcher.handle(event)).toEqual({ status: "not_handled", reason: "debounced" });
    expect(launcher.calls).toHaveLength(1);
  });

  it("handles both opens when they are three seconds apart", async () => {
    const { dispatcher, clock, launcher } = setup();
    const event = { path: "report.pdf", triggerId: "find-file" };

    expect((await dispatcher.handle(event)).status).toBe("handled");
    clock.advance(3000);
    expect((await dispatcher.handle(event)).status).toBe("handled");
    expect(launcher.calls).toHaveLength(2);
  });

  it("never acts for an excluded trigger", async () => {
    const { dispatcher, launcher } = setup({ exclusions: [/^dired-/, /grep/] });

    expect(await dispatcher.handle({ path: "report.pdf", triggerId: "dired-find-file" })).toEqual({
      status: "not_handled",
      reason: "excluded",
    });
    expect(launcher.calls).toHaveLength(0);
  });

  it("checks exclusions after the debounce gate has recorded the attempt", async () => {
    const { dispatcher, guard } = setup({ exclusions: [/^dired-/] });

    await dispatcher.handle({ path: "report.pdf", triggerId: "dired-find-file" });

    expect(guard.lastActivation).toBe(100_000);
  });

  it("does not launch when the user declines, but keeps the debounce timestamp", async () => {
    const confirmer = new ScriptedConfirmer(false);
    const { dispatcher, launcher, guard, notifier, recent } = setup({ confirm: true }, confirmer);

    const result = await dispatcher.handle({ path: "report.pdf", triggerId: "find-file" });

    expect(result).toEqual({ status: "not_handled", reason: "declined" });
    expect(confirmer.questions).toEqual(["acroread report.pdf? "]);
    expect(launcher.calls).toHaveLength(0);
    expect(notifier.messages).toHaveLength(0);
    expect(recent.files).toHaveLength(0);
    expect(guard.lastActivation).toBe(100_000);
  });

  it("launches after a positive confirmation", async () => {
    const confirmer = new ScriptedConfirmer(true);
    const { dispatcher, launcher } = setup({ confirm: true }, confirmer);

    const result = await dispatcher.handle({ path: "report.pdf", triggerId: "find-file" });

    expect(result.status).toBe("handled");
    expect(confirmer.questions).toHaveLength(1);
    expect(launcher.calls).toHaveLength(1);
  });

  it("does not ask when confirmation is off", async () => {
    const confirmer = new ScriptedConfirmer(false);
    const { dispatcher } = setup({ confirm: false }, confirmer);

    await dispatcher.handle({ path: "report.pdf", triggerId: "find-file" });

    expect(confirmer.questions).toHaveLength(0);
  });

  it("does nothing while disabled and leaves the guard cold", async () => {
    const { dispatcher, guard, launcher } = setup({ enabled: false });

    expect(await dispatcher.handle({ path: "report.pdf", triggerId: "find-file" })).toEqual({
      status: "not_handled",
      reason: "disabled",
    });
    expect(guard.lastActivation).toBe(Number.NEGATIVE_INFINITY);
    expect(launcher.calls).toHaveLength(0);

    dispatcher.setEnabled(true);
    expect((await dispatcher.handle(findFile("report.pdf"))).status).toBe("handled");
  });

  it("leaves a modified or non-empty target alone", async () => {
    const { dispatcher, guard } = setup();

    expect(
      await dispatcher.handle({ ...findFile("report.pdf"), target: new FakeBuffer(true, 0) }),
    ).toEqual({ status: "not_handled", reason: "not_pristine" });
    expect(
      await dispatcher.handle({ ...findFile("report.pdf"), target: new FakeBuffer(false, 12) }),
    ).toEqual({ status: "not_handled", reason: "not_pristine" });
    expect(guard.lastActivation).toBe(Number.NEGATIVE_INFINITY);
  });

  it("closes the pristine target after launching", async () => {
    const { dispatcher } = setup();
    const target = new FakeBuffer();

    await dispatcher.handle({ path: "report.pdf", triggerId: "find-file", target });

    expect(target.closed).toBe(true);
  });

  it("lets a launch failure escape before any post-launch effect", async () => {
    const { dispatcher, launcher, notifier, recent } = setup();
    launcher.failWith = new Error("spawn acroread ENOENT");
    const target = new FakeBuffer();

    await expect(dispatcher.handle({ ...findFile("report.pdf"), target })).rejects.toThrow(
      "spawn acroread ENOENT",
    );
    expect(target.closed).toBe(false);
    expect(notifier.messages).toHaveLength(0);
    expect(recent.files).toHaveLength(0);
  });

  it("works without a recent-files store", async () => {
    const dispatcher = new Dispatcher({
      config: pdfOnly,
      guard: new DebounceGuard(),
      launcher: new FakeLauncher(),
      confirmer: new ScriptedConfirmer(true),
      notifier: new RecordingNotifier(),
      recentFiles: null,
      logger: silentLogger,
    });

    expect((await dispatcher.handle(findFile("report.pdf"))).status).toBe("handled");
  });

  it("replaces the whole configuration on setConfig", async () => {
    const { dispatcher, clock, launcher } = setup();

    dispatcher.setConfig({
      ...pdfOnly,
      associations: [{ pattern: /\.mp3$/, program: "xmms", args: [fileArg] }],
    });

    expect(await dispatcher.handle({ path: "report.pdf", triggerId: "find-file" })).toEqual({
      status: "not_handled",
      reason: "no_match",
    });
    clock.advance(5000);
    expect((await dispatcher.handle(findFile("song.mp3"))).status).toBe("handled");
    expect(launcher.calls.map((c) => c.program)).toEqual(["xmms"]);
  });

  it("uses a swapped launcher", async () => {
    const { dispatcher, launcher } = setup();
    const replacement = new FakeLauncher();

    dispatcher.setLauncher(replacement);
    await dispatcher.handle({ path: "report.pdf", triggerId: "find-file" });

    expect(launcher.calls).toHaveLength(0);
    expect(replacement.calls).toHaveLength(1);
  });
});

describe("dispatcher helpers", () => {
  it("treats a missing target as pristine", () => {
    expect(isPristine(undefined)).toBe(true);
    expect(isPristine(null)).toBe(true);
    expect(isPristine(new FakeBuffer())).toBe(true);
  });

  it("matches exclusions anywhere in the trigger id", () => {
    expect(isExcluded("dired-find-file", [/find/])).toBe(true);
    expect(isExcluded("find-file", [/^dired-/])).toBe(false);
    expect(isExcluded("find-file", [])).toBe(false);
    expect(isExcluded("dired-find-file", [/find/y])).toBe(true);
  });

  it("names only the file in the notification", () => {
    expect(openedMessage("/home/u/docs/report.pdf")).toBe("Opened report.pdf in external program");
  });
});
