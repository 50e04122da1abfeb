/**
 * Reading and writing the engine's textual value representation.
 *
 * An evaluated command comes back as the engine's debug representation of
 * the value. Objects in it are described as
 *
 *   Class: ENS_PART, desc: 'Sphere', CvfObjID: 1078, cached:no
 *
 * anywhere inside otherwise arbitrary text. `scanObjectReferences` splits a
 * result into literal text and object references in one left-to-right pass;
 * `parseLiteral` then rebuilds a value from those pieces, with each object
 * reference as an opaque atom.
 */

import { MarshalError } from "./errors.ts";

const OBJECT_ID_MARKER = "CvfObjID:";
const CLASS_MARKER = "Class: ";
const TRAILERS = [", cached:no", ", cached:yes"] as const;

// ============================================================================
// Scanning
// ============================================================================

export interface ObjectReference {
  className: string;
  objectId: number;
  /** The description span that was recognised */
  source: string;
}

export type ScanToken =
  | { kind: "text"; text: string }
  | ({ kind: "object" } & ObjectReference);

function findTrailer(text: string, from: number): { start: number; end: number } | null {
  let best: { start: number; end: number } | null = null;
  for (const trailer of TRAILERS) {
    const start = text.indexOf(trailer, from);
    if (start !== -1 && (best === null || start < best.start)) {
      best = { start, end: start + trailer.length };
    }
  }
  return best;
}

/**
 * Split `text` into literal spans and object references.
 *
 * Scanning stops at the first inconsistent description (no `Class: ` after
 * the previous reference, no `cached:` trailer, or a trailer that belongs to
 * a later reference) and the remainder is kept as text.
 *
 * @throws MarshalError if a well-delimited identity is not an integer
 */
export function scanObjectReferences(text: string): ScanToken[] {
  const tokens: ScanToken[] = [];
  let pos = 0;

  while (pos < text.length) {
    const idAt = text.indexOf(OBJECT_ID_MARKER, pos);
    if (idAt === -1) break;

    const classAt = text.lastIndexOf(CLASS_MARKER, idAt);
    if (classAt < pos) break;

    const trailer = findTrailer(text, idAt);
    if (!trailer) break;

    const nextIdAt = text.indexOf(OBJECT_ID_MARKER, idAt + OBJECT_ID_MARKER.length);
    if (nextIdAt !== -1 && nextIdAt < trailer.start) break;

    const idText = text.slice(idAt + OBJECT_ID_MARKER.length, trailer.start).trim();
    if (!/^-?\d+$/.test(idText)) {
      throw new MarshalError(`Invalid object identity "${idText}"`);
    }

    const classText = text.slice(classAt + CLASS_MARKER.length, idAt);
    const comma = classText.indexOf(",");
    const className = (comma === -1 ? classText : classText.slice(0, comma)).trim();

    if (classAt > pos) {
      tokens.push({ kind: "text", text: text.slice(pos, classAt) });
    }
    tokens.push({
      kind: "object",
      className,
      objectId: Number(idText),
      source: text.slice(classAt, trailer.end),
    });
    pos = trailer.end;
  }

  if (pos < text.length) {
    tokens.push({ kind: "text", text: text.slice(pos) });
  }
  return tokens;
}

// ============================================================================
// Literal parsing
// ============================================================================

export type LiteralPiece<A> = { kind: "text"; text: string } | { kind: "atom"; value: A };

export type Literal<A> =
  | null
  | boolean
  | number
  | string
  | A
  | Literal<A>[]
  | { [key: string]: Literal<A> };

export type ParseOutcome<A> =
  | { ok: true; value: Literal<A>; topLevelList: boolean }
  | { ok: false; reason: string };

class LiteralSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LiteralSyntaxError";
  }
}

const WHITESPACE = /\s/;
const NUMBER = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?/;
const SIMPLE_ESCAPES: Record<string, string> = {
  "\\": "\\",
  "'": "'",
  '"': '"',
  n: "\n",
  r: "\r",
  t: "\t",
  b: "\b",
  f: "\f",
  v: "\v",
  a: "\x07",
  "0": "\0",
};

/**
 * Cursor over text pieces interleaved with atoms.
 */
class PieceReader<A> {
  private index = 0;
  private offset = 0;

  constructor(private readonly pieces: readonly LiteralPiece<A>[]) {}

  private current(): LiteralPiece<A> | undefined {
    for (;;) {
      const piece = this.pieces[this.index];
      if (piece?.kind === "text" && this.offset >= piece.text.length) {
        this.index++;
        this.offset = 0;
        continue;
      }
      return piece;
    }
  }

  skipWhitespace(): void {
    for (;;) {
      const piece = this.current();
      if (piece?.kind !== "text") return;
      const ch = piece.text[this.offset];
      if (ch === undefined || !WHITESPACE.test(ch)) return;
      this.offset++;
    }
  }

  atEnd(): boolean {
    return this.current() === undefined;
  }

  /** Next character, or undefined at an atom or the end. */
  peek(): string | undefined {
    const piece = this.current();
    return piece?.kind === "text" ? piece.text[this.offset] : undefined;
  }

  next(): string {
    const ch = this.peek();
    if (ch === undefined) {
      throw new LiteralSyntaxError("Unexpected end of text");
    }
    this.offset++;
    return ch;
  }

  expect(ch: string): void {
    const got = this.next();
    if (got !== ch) {
      throw new LiteralSyntaxError(`Expected '${ch}' but found '${got}'`);
    }
  }

  /** Remaining text of the current piece. */
  rest(): string {
    const piece = this.current();
    return piece?.kind === "text" ? piece.text.slice(this.offset) : "";
  }

  advance(count: number): void {
    this.offset += count;
  }

  takeAtom(): { found: true; value: A } | { found: false } {
    const piece = this.current();
    if (piece?.kind !== "atom") {
      return { found: false };
    }
    this.index++;
    this.offset = 0;
    return { found: true, value: piece.value };
  }
}

function parseValue<A>(reader: PieceReader<A>): Literal<A> {
  reader.skipWhitespace();

  const atom = reader.takeAtom();
  if (atom.found) {
    return atom.value;
  }

  const ch = reader.peek();
  switch (ch) {
    case undefined:
      throw new LiteralSyntaxError("Expected a value");
    case "[":
      reader.next();
      return parseSequence(reader, "]");
    case "(":
      reader.next();
      return parseParenthesized(reader);
    case "{":
      reader.next();
      return parseBraced(reader);
    case "'":
    case '"':
      return parseString(reader);
  }

  const rest = reader.rest();
  if (rest.startsWith("b'") || rest.startsWith('b"')) {
    reader.advance(1);
    return parseString(reader);
  }

  for (const [word, value] of KEYWORDS) {
    if (rest.startsWith(word) && !/^\w/.test(rest.slice(word.length))) {
      reader.advance(word.length);
      return value;
    }
  }

  const match = NUMBER.exec(rest);
  if (match && !/^[\w.]/.test(rest.slice(match[0].length))) {
    reader.advance(match[0].length);
    return Number(match[0]);
  }

  throw new LiteralSyntaxError(`Unexpected text '${rest.slice(0, 20)}'`);
}

const KEYWORDS: ReadonlyArray<readonly [string, null | boolean | number]> = [
  ["True", true],
  ["False", false],
  ["None", null],
  ["-inf", -Infinity],
  ["inf", Infinity],
  ["nan", NaN],
];

/** Parse items up to `close`, the opening bracket already consumed. */
function parseSequence<A>(reader: PieceReader<A>, close: string): Literal<A>[] {
  const items: Literal<A>[] = [];
  for (;;) {
    reader.skipWhitespace();
    if (reader.peek() === close) {
      reader.next();
      return items;
    }
    items.push(parseValue(reader));
    reader.skipWhitespace();
    const sep = reader.next();
    if (sep === close) {
      return items;
    }
    if (sep !== ",") {
      throw new LiteralSyntaxError(`Expected ',' or '${close}' but found '${sep}'`);
    }
  }
}

/** A tuple, or a parenthesized single value. */
function parseParenthesized<A>(reader: PieceReader<A>): Literal<A> {
  reader.skipWhitespace();
  if (reader.peek() === ")") {
    reader.next();
    return [];
  }
  const first = parseValue(reader);
  reader.skipWhitespace();
  if (reader.peek() === ")") {
    reader.next();
    return first;
  }
  reader.expect(",");
  return [first, ...parseSequence(reader, ")")];
}

/** A dict, or a set (returned as a list). */
function parseBraced<A>(reader: PieceReader<A>): Literal<A> {
  reader.skipWhitespace();
  if (reader.peek() === "}") {
    reader.next();
    return {};
  }

  const firstKey = parseValue(reader);
  reader.skipWhitespace();
  if (reader.peek() !== ":") {
    reader.skipWhitespace();
    if (reader.peek() === "}") {
      reader.next();
      return [firstKey];
    }
    reader.expect(",");
    return [firstKey, ...parseSequence(reader, "}")];
  }

  const dict: { [key: string]: Literal<A> } = {};
  let key = firstKey;
  for (;;) {
    reader.expect(":");
    dict[String(key)] = parseValue(reader);
    reader.skipWhitespace();
    const sep = reader.next();
    if (sep === "}") {
      return dict;
    }
    if (sep !== ",") {
      throw new LiteralSyntaxError(`Expected ',' or '}' but found '${sep}'`);
    }
    reader.skipWhitespace();
    if (reader.peek() === "}") {
      reader.next();
      return dict;
    }
    key = parseValue(reader);
    reader.skipWhitespace();
  }
}

function parseString<A>(reader: PieceReader<A>): string {
  const quote = reader.next();
  let out = "";
  for (;;) {
    const ch = reader.next();
    if (ch === quote) {
      return out;
    }
    if (ch !== "\\") {
      out += ch;
      continue;
    }
    const esc = reader.next();
    const simple = SIMPLE_ESCAPES[esc];
    if (simple !== undefined) {
      out += simple;
      continue;
    }
    const width = esc === "x" ? 2 : esc === "u" ? 4 : esc === "U" ? 8 : 0;
    if (width === 0) {
      // Unknown escapes are kept verbatim
      out += `\\${esc}`;
      continue;
    }
    let hex = "";
    for (let i = 0; i < width; i++) {
      hex += reader.next();
    }
    if (!/^[0-9a-fA-F]+$/.test(hex)) {
      throw new LiteralSyntaxError(`Invalid escape \\${esc}${hex}`);
    }
    out += String.fromCodePoint(parseInt(hex, 16));
  }
}

/**
 * Rebuild a value from text pieces and atoms.
 *
 * Fails (rather than throwing) when the pieces are not a single literal, so
 * the caller can keep the text as it was.
 */
export function parseLiteral<A>(pieces: readonly LiteralPiece<A>[]): ParseOutcome<A> {
  const reader = new PieceReader(pieces);
  try {
    reader.skipWhitespace();
    const topLevelList = reader.peek() === "[";
    const value = parseValue(reader);
    reader.skipWhitespace();
    if (!reader.atEnd()) {
      return { ok: false, reason: "Trailing text after value" };
    }
    return { ok: true, value, topLevelList };
  } catch (err) {
    if (err instanceof LiteralSyntaxError) {
      return { ok: false, reason: err.message };
    }
    throw err;
  }
}

/**
 * Parse plain text that holds no object references.
 */
export function parseLiteralText(text: string): ParseOutcome<never> {
  return parseLiteral<never>([{ kind: "text", text }]);
}

// ============================================================================
// Formatting
// ============================================================================

/** Anything that knows how to spell itself in a command string. */
export interface LiteralSource {
  toLiteral(): string;
}

export type LiteralInput =
  | null
  | undefined
  | boolean
  | number
  | string
  | LiteralSource
  | readonly LiteralInput[]
  | { readonly [key: string]: LiteralInput };

function isLiteralSource(value: object): value is LiteralSource {
  return "toLiteral" in value && typeof value.toLiteral === "function";
}

function quote(text: string): string {
  let out = "'";
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    if (ch === "\\" || ch === "'") {
      out += `\\${ch}`;
    } else if (ch === "\n") {
      out += "\\n";
    } else if (ch === "\r") {
      out += "\\r";
    } else if (ch === "\t") {
      out += "\\t";
    } else if (code < 0x20 || code === 0x7f) {
      out += `\\x${code.toString(16).padStart(2, "0")}`;
    } else {
      out += ch;
    }
  }
  return `${out}'`;
}

/**
 * Spell a local value as a literal the engine can evaluate.
 */
export function formatLiteral(value: LiteralInput): string {
  if (value === null || value === undefined) {
    return "None";
  }
  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }
  if (typeof value === "number") {
    if (Number.isNaN(value)) return "float('nan')";
    if (value === Infinity) return "float('inf')";
    if (value === -Infinity) return "float('-inf')";
    return String(value);
  }
  if (typeof value === "string") {
    return quote(value);
  }
  if (isReadonlyArray(value)) {
    return `[${value.map(formatLiteral).join(", ")}]`;
  }
  if (isLiteralSource(value)) {
    return value.toLiteral();
  }
  const entries = Object.entries(value).map(
    ([key, item]) => `${quote(key)}: ${formatLiteral(item)}`
  );
  return `{${entries.join(", ")}}`;
}

function isReadonlyArray(value: unknown): value is readonly LiteralInput[] {
  return Array.isArray(value);
}
