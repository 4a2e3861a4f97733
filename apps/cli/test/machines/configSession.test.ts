import {
  ConfigCorrupt,
  ConfigStore,
  ConfigurationRecord,
  ConfigValidationFailed,
  EmptyField,
  NotWritable,
  needsSetup,
  ready,
} from "@crateyard/config";
import { Effect, Option } from "effect";
import { describe, expect, it } from "vitest";
import { createActor, waitFor } from "xstate";

import { configSessionMachine } from "../../src/machines/configSession";
import { makeFakeStore, type FakeStoreOptions } from "../fakes";

const record = new ConfigurationRecord({ projectsDirectory: "/work", editorCommand: "code" });

const startSession = (options: FakeStoreOptions) => {
  const store = makeFakeStore(options);
  const runtime = Effect.runSync(
    Effect.runtime<ConfigStore>().pipe(Effect.provide(store.layer)),
  );
  const actor = createActor(configSessionMachine, { input: { runtime } });
  actor.start();

  return { actor, submissions: store.submissions };
};

const settled = (actor: ReturnType<typeof startSession>["actor"]) =>
  waitFor(actor, (state) => !state.hasTag("busy"));

describe("configSessionMachine", () => {
  it("starts by loading", () => {
    const { actor } = startSession({ load: Effect.never });

    expect(actor.getSnapshot().value).toBe("loading");
    expect(actor.getSnapshot().hasTag("busy")).toBe(true);
    actor.stop();
  });

  it("finishes in ready when the configuration loads", async () => {
    const { actor } = startSession({ load: Effect.succeed(ready(record)) });

    const snapshot = await settled(actor);

    expect(snapshot.value).toBe("ready");
    expect(snapshot.status).toBe("done");
    expect(snapshot.context.config).toBe(record);
  });

  it("asks for setup when the file is missing", async () => {
    const { actor } = startSession({ load: Effect.succeed(needsSetup("missing_file")) });

    const snapshot = await settled(actor);

    expect(snapshot.value).toBe("setup");
    expect(snapshot.context.setupReason).toBe("missing_file");
    expect(Option.isNone(snapshot.context.fault)).toBe(true);
  });

  it("keeps the validation fault found while loading", async () => {
    const fault = new NotWritable({ field: "projects_directory", path: "/ro", message: "EROFS" });
    const { actor } = startSession({
      load: Effect.succeed(needsSetup("incomplete_data", Option.some(fault))),
    });

    const snapshot = await settled(actor);

    expect(snapshot.context.setupReason).toBe("incomplete_data");
    expect(Option.getOrNull(snapshot.context.fault)).toBe(fault);
  });

  it("finishes in failed on a corrupt file", async () => {
    const failure = new ConfigCorrupt({ path: "/c.yaml", message: "bad" });
    const { actor } = startSession({ load: Effect.fail(failure) });

    const snapshot = await settled(actor);

    expect(snapshot.value).toBe("failed");
    expect(snapshot.context.loadFailure).toBe(failure);
  });

  it("saves a submission and finishes in ready", async () => {
    const { actor, submissions } = startSession({
      load: Effect.succeed(needsSetup("missing_file")),
    });
    await settled(actor);

    actor.send({ type: "SUBMIT", draft: { projectsDirectory: "/work", editorCommand: "code" } });
    const snapshot = await settled(actor);

    expect(submissions).toEqual([["/work", "code"]]);
    expect(snapshot.value).toBe("ready");
    expect(snapshot.context.config).toEqual(record);
  });

  it("returns to setup with the failure when saving fails, then retries", async () => {
    let attempts = 0;
    const { actor, submissions } = startSession({
      load: Effect.succeed(needsSetup("missing_file")),
      createAndPersist: (projectsDirectory, editorCommand) => {
        attempts += 1;
        return attempts === 1
          ? Effect.fail(
              new ConfigValidationFailed({ fault: new EmptyField({ field: "editor_command" }) }),
            )
          : Effect.succeed(new ConfigurationRecord({ projectsDirectory, editorCommand }));
      },
    });
    await settled(actor);

    actor.send({ type: "SUBMIT", draft: { projectsDirectory: "/work", editorCommand: " " } });
    const retry = await settled(actor);

    expect(retry.value).toBe("setup");
    expect(retry.context.draft).toEqual({ projectsDirectory: "/work", editorCommand: " " });
    expect(
      Option.getOrNull(Option.map(retry.context.saveFailure, (failure) => failure._tag)),
    ).toBe("ConfigValidationFailed");

    actor.send({ type: "SUBMIT", draft: { projectsDirectory: "/work", editorCommand: "code" } });
    const done = await settled(actor);

    expect(done.value).toBe("ready");
    expect(Option.isNone(done.context.saveFailure)).toBe(true);
    expect(submissions).toHaveLength(2);
  });

  it("finishes in quit on QUIT", async () => {
    const { actor, submissions } = startSession({
      load: Effect.succeed(needsSetup("missing_file")),
    });
    await settled(actor);

    actor.send({ type: "QUIT" });

    expect(actor.getSnapshot().value).toBe("quit");
    expect(actor.getSnapshot().status).toBe("done");
    expect(submissions).toEqual([]);
  });
});
