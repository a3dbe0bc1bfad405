export interface Position {
  /** Byte offset into the UTF-8 source. */
  offset: number;
  line: number;
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
  source: string;
}

export type Severity = "error" | "warning" | "info";

export interface Diagnostic {
  severity: Severity;
  message: string;
  span: Span;
  help?: string;
}

export function error(message: string, span: Span, help?: string): Diagnostic {
  return { severity: "error", message, span, help };
}

export function warning(message: string, span: Span, help?: string): Diagnostic {
  return { severity: "warning", message, span, help };
}

export function makeSpan(source: string, start: Position, end: Position): Span {
  return { start: { ...start }, end: { ...end }, source };
}
