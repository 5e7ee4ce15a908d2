import { Doc } from "@effect/printer";
import { Ansi, AnsiDoc } from "@effect/printer-ansi";

export type Tone = "error" | "success" | "warning" | "info";

const TONES: Record<Tone, Ansi.Ansi> = {
  error: Ansi.red,
  success: Ansi.green,
  warning: Ansi.yellow,
  info: Ansi.blue,
};

/** Colour is off for pipes and when NO_COLOR is set. */
export function colorEnabled(
  stream: { isTTY?: boolean } = process.stdout,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  return stream.isTTY === true && !env.NO_COLOR;
}

export function paint(text: string, tone: Tone, enabled = colorEnabled()): string {
  if (!enabled) return text;
  return Doc.text(text).pipe(
    Doc.annotate(TONES[tone]),
    AnsiDoc.render({ style: "pretty" }),
  );
}
