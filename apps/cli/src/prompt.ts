import { Terminal } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Effect, Schema } from "effect";

/** Standard input was closed or the user pressed Ctrl+C / Ctrl+D. */
export class InputClosed extends Schema.TaggedError<InputClosed>("@crateyard/cli/InputClosed")(
  "InputClosed",
  {},
) {}

export const say = (text: string): Effect.Effect<void, PlatformError, Terminal.Terminal> =>
  Effect.flatMap(Terminal.Terminal, (terminal) => terminal.display(`${text}\n`));

export const ask = (
  question: string,
): Effect.Effect<string, PlatformError | InputClosed, Terminal.Terminal> =>
  Effect.gen(function* () {
    const terminal = yield* Terminal.Terminal;
    yield* terminal.display(question);

    return yield* terminal.readLine.pipe(
      Effect.catchTag("QuitException", () => Effect.fail(new InputClosed())),
    );
  });

/**
 * Asks until the answer is one of the schema's literals. A blank answer picks `fallback`.
 */
export const askChoice = <A extends string>(
  question: string,
  schema: Schema.Schema<A>,
  fallback: A,
): Effect.Effect<A, PlatformError | InputClosed, Terminal.Terminal> => {
  const decode = Schema.decodeUnknownOption(schema);

  const loop: Effect.Effect<A, PlatformError | InputClosed, Terminal.Terminal> = Effect.gen(
    function* () {
      const answer = (yield* ask(question)).trim();

      if (answer === "") {
        return fallback;
      }

      const decoded = decode(answer);
      if (decoded._tag === "Some") {
        return decoded.value;
      }

      yield* say(`'${answer}' is not one of the offered options.`);
      return yield* loop;
    },
  );

  return loop;
};

export const askYesNo = (
  question: string,
): Effect.Effect<boolean, PlatformError | InputClosed, Terminal.Terminal> =>
  ask(question).pipe(
    Effect.map((answer) => {
      const normalized = answer.trim().toLowerCase();
      return normalized === "y" || normalized === "yes";
    }),
  );
