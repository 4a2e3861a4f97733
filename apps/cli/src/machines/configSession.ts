import {
  ConfigStore,
  type ConfigurationRecord,
  type LoadFailure,
  type LoadOutcome,
  type SaveFailure,
  type SetupReason,
  type ValidationFault,
} from "@crateyard/config";
import { Effect, Either, Option, Runtime } from "effect";
import { assign, fromPromise, setup } from "xstate";

export interface SetupDraft {
  readonly projectsDirectory: string;
  readonly editorCommand: string;
}

interface ConfigSessionContext {
  runtime: Runtime.Runtime<ConfigStore>;

  // Set once a configuration has been loaded or saved
  config: ConfigurationRecord | null;

  // Why setup is needed, and what the loader found wrong
  setupReason: SetupReason;
  fault: Option.Option<ValidationFault>;

  // Last submitted values and why saving them failed
  draft: SetupDraft;
  saveFailure: Option.Option<SaveFailure>;

  // Terminal failures
  loadFailure: LoadFailure | null;
  defect: string | null;
}

type ConfigSessionEvent = { type: "SUBMIT"; draft: SetupDraft } | { type: "QUIT" };

type LoadResult = Either.Either<LoadOutcome, LoadFailure>;
type SaveResult = Either.Either<ConfigurationRecord, SaveFailure>;

const loadActor = fromPromise(
  async ({
    input,
    signal,
  }: {
    input: { runtime: Runtime.Runtime<ConfigStore> };
    signal: AbortSignal;
  }): Promise<LoadResult> => {
    const program = Effect.flatMap(ConfigStore, (store) => store.load()).pipe(Effect.either);

    return Runtime.runPromise(input.runtime)(program, { signal });
  },
);

const saveActor = fromPromise(
  async ({
    input,
    signal,
  }: {
    input: { draft: SetupDraft; runtime: Runtime.Runtime<ConfigStore> };
    signal: AbortSignal;
  }): Promise<SaveResult> => {
    const { draft, runtime } = input;
    const program = Effect.flatMap(ConfigStore, (store) =>
      store.createAndPersist(draft.projectsDirectory, draft.editorCommand),
    ).pipe(Effect.either);

    return Runtime.runPromise(runtime)(program, { signal });
  },
);

const fromLoadResult = (result: LoadResult): Partial<ConfigSessionContext> =>
  Either.match(result, {
    onLeft: (failure) => ({ loadFailure: failure }),
    onRight: (outcome) =>
      outcome.status === "ready"
        ? { config: outcome.config }
        : { setupReason: outcome.reason, fault: outcome.fault },
  });

const fromSaveResult = (result: SaveResult): Partial<ConfigSessionContext> =>
  Either.match(result, {
    onLeft: (failure) => ({ saveFailure: Option.some(failure) }),
    onRight: (config) => ({ config, saveFailure: Option.none() }),
  });

export const configSessionMachine = setup({
  types: {
    context: {} as ConfigSessionContext,
    events: {} as ConfigSessionEvent,
    input: {} as { runtime: Runtime.Runtime<ConfigStore> },
    tags: {} as "busy",
  },

  actors: {
    load: loadActor,
    save: saveActor,
  },

  guards: {
    hasConfig: ({ context }) => context.config !== null,
    hasLoadFailure: ({ context }) => context.loadFailure !== null,
  },
}).createMachine({
  id: "configSession",

  context: ({ input }) => ({
    runtime: input.runtime,
    config: null,
    setupReason: "missing_file",
    fault: Option.none(),
    draft: { projectsDirectory: "", editorCommand: "" },
    saveFailure: Option.none(),
    loadFailure: null,
    defect: null,
  }),

  initial: "loading",

  states: {
    loading: {
      tags: ["busy"],
      invoke: {
        src: "load",
        input: ({ context }) => ({ runtime: context.runtime }),
        onDone: {
          target: "routing",
          actions: assign(({ event }) => fromLoadResult(event.output)),
        },
        onError: {
          target: "failed",
          actions: assign({ defect: ({ event }) => String(event.error) }),
        },
      },
    },

    routing: {
      always: [
        { target: "ready", guard: "hasConfig" },
        { target: "failed", guard: "hasLoadFailure" },
        { target: "setup" },
      ],
    },

    setup: {
      on: {
        SUBMIT: {
          target: "saving",
          actions: assign({ draft: ({ event }) => event.draft }),
        },
        QUIT: { target: "quit" },
      },
    },

    saving: {
      tags: ["busy"],
      invoke: {
        src: "save",
        input: ({ context }) => ({ draft: context.draft, runtime: context.runtime }),
        onDone: {
          target: "routing",
          actions: assign(({ event }) => fromSaveResult(event.output)),
        },
        onError: {
          target: "failed",
          actions: assign({ defect: ({ event }) => String(event.error) }),
        },
      },
    },

    ready: { type: "final" },
    failed: { type: "final" },
    quit: { type: "final" },
  },
});
