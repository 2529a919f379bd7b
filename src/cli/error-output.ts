import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
} from "../core/error-format.js";

export type CliErrorOutputOptions = {
  debug?: boolean;
  useColor?: boolean;
};

export function renderCliError(error: unknown, options: CliErrorOutputOptions = {}): string[] {
  const format = createAnsiFormatter(resolveColorEnabled({ useColor: options.useColor }));
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  return lines.map((line) => styleLine(line, format));
}

export function printCliError(error: unknown, options: CliErrorOutputOptions = {}): void {
  for (const line of renderCliError(error, options)) {
    console.error(line);
  }
  process.exitCode = 1;
}

function styleLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return format(`error: ${line.text}`, ["bold", "red"]);
    case "message":
      return `  ${line.text}`;
    case "unit":
      return `  ${format(line.text, ["cyan"])}`;
    case "hint":
      return `  ${format(`hint: ${line.text}`, ["yellow"])}`;
    case "next":
      return `  ${format(`next: ${line.text}`, ["green"])}`;
    case "code":
      return `  ${format(`code: ${line.text}`, ["dim"])}`;
    case "cause":
      return `  ${format(`caused by: ${line.text}`, ["dim"])}`;
    case "stack":
      return format(line.text, ["dim"]);
  }
}
