/**
 * MITS11 Bootstrap Engine — Pattern-Based Manifest Parser
 *
 * Reads the manifest without a JSON parser. The text is whitespace
 * normalized, then the whole document is walked member by member: keys
 * are read as string literals and values are stepped over with the same
 * grammar JSON.parse applies, so nested objects, arrays and braces inside
 * strings never confuse the lookup and malformed text is rejected.
 */

import { ManifestParser, malformedManifest, platformMissing, toPlatformEntry } from "./parser";
import { PlatformEntry, PlatformId } from "../types";

interface Span {
  start: number;
  end: number;
}

const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

/** Drop line breaks and tabs, collapse other whitespace runs to one space. */
export function normalizeWhitespace(text: string): string {
  return text.replace(/[\r\n\t]/g, "").replace(/\s+/g, " ");
}

/** Decode the body of a string literal (without its quotes). */
export function decodeStringLiteral(body: string): string {
  return body.replace(/\\(u[0-9a-fA-F]{4}|.)/g, (_match, esc: string) => {
    if (esc.length === 5) {
      return String.fromCharCode(parseInt(esc.slice(1), 16));
    }
    return SIMPLE_ESCAPES[esc] ?? esc;
  });
}

function skipSpaces(text: string, i: number): number {
  while (i < text.length && text[i] === " ") i++;
  return i;
}

const ESCAPE_CHARS = '"\\/bfnrt';
const HEX4 = /^[0-9a-fA-F]{4}$/;
const SCALAR = /^(?:true|false|null|-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?)$/;

/** `i` is at an opening quote; returns the index just past the closing one, or -1. */
function skipString(text: string, i: number): number {
  for (let j = i + 1; j < text.length; j++) {
    if (text[j] === "\\") {
      const esc = text[j + 1];
      if (esc === "u") {
        if (!HEX4.test(text.slice(j + 2, j + 6))) return -1;
        j += 5;
      } else if (esc !== undefined && ESCAPE_CHARS.includes(esc)) {
        j++;
      } else {
        return -1;
      }
    } else if (text[j] === '"') {
      return j + 1;
    }
  }
  return -1;
}

interface ObjectScan {
  /** Direct members; a repeated key keeps its last value */
  members: Map<string, Span>;
  end: number;
}

/** `start` is at `{`; walks every member up to the matching `}`. */
function scanObject(text: string, start: number): ObjectScan | undefined {
  const members = new Map<string, Span>();
  let i = skipSpaces(text, start + 1);
  if (text[i] === "}") return { members, end: i + 1 };

  for (;;) {
    // Also rejects a comma directly before `}`
    if (text[i] !== '"') return undefined;
    const keyEnd = skipString(text, i);
    if (keyEnd === -1) return undefined;
    const name = decodeStringLiteral(text.slice(i + 1, keyEnd - 1));

    i = skipSpaces(text, keyEnd);
    if (text[i] !== ":") return undefined;
    const valueStart = skipSpaces(text, i + 1);
    const valueEnd = skipValue(text, valueStart);
    if (valueEnd === -1) return undefined;
    members.set(name, { start: valueStart, end: valueEnd });

    i = skipSpaces(text, valueEnd);
    if (text[i] === "}") return { members, end: i + 1 };
    if (text[i] !== ",") return undefined;
    i = skipSpaces(text, i + 1);
  }
}

/** `start` is at `[`; returns the index just past its `]`, or -1. */
function skipArray(text: string, start: number): number {
  let i = skipSpaces(text, start + 1);
  if (text[i] === "]") return i + 1;

  for (;;) {
    const end = skipValue(text, i);
    if (end === -1) return -1;
    i = skipSpaces(text, end);
    if (text[i] === "]") return i + 1;
    if (text[i] !== ",") return -1;
    i = skipSpaces(text, i + 1);
  }
}

function skipValue(text: string, i: number): number {
  const ch = text[i];
  if (ch === '"') return skipString(text, i);
  if (ch === "{") return scanObject(text, i)?.end ?? -1;
  if (ch === "[") return skipArray(text, i);
  let j = i;
  while (j < text.length && !",}] ".includes(text[j])) j++;
  return SCALAR.test(text.slice(i, j)) ? j : -1;
}

function objectAt(text: string, span: Span | undefined): ObjectScan | undefined {
  if (span === undefined || text[span.start] !== "{") return undefined;
  return scanObject(text, span.start);
}

function readStringMember(text: string, object: ObjectScan, key: string): string | undefined {
  const span = object.members.get(key);
  if (!span || text[span.start] !== '"') return undefined;
  return decodeStringLiteral(text.slice(span.start + 1, span.end - 1));
}

export class PatternManifestParser implements ManifestParser {
  readonly kind = "pattern" as const;

  readPlatformEntry(json: string, platform: PlatformId, version: string): PlatformEntry {
    const text = normalizeWhitespace(json);
    const rootStart = skipSpaces(text, 0);
    const root = text[rootStart] === "{" ? scanObject(text, rootStart) : undefined;
    if (!root || skipSpaces(text, root.end) !== text.length) {
      throw malformedManifest(version, "document is not an object");
    }

    const platforms = objectAt(text, root.members.get("platforms"));
    if (!platforms) {
      throw malformedManifest(version, "missing platforms object");
    }

    const entry = objectAt(text, platforms.members.get(platform));
    if (!entry) {
      throw platformMissing(platform, version);
    }

    return toPlatformEntry(
      {
        url: readStringMember(text, entry, "url"),
        sha256: readStringMember(text, entry, "sha256"),
      },
      platform,
      version,
    );
  }
}
