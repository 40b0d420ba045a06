import { InvalidCursorError } from "../errors";

const PREFIX = "seq:";

// Opaque to clients; wraps the commit sequence of the last item on a page.
export function encodeCursor(sequence: string): string {
  return Buffer.from(`${PREFIX}${sequence}`, "utf8").toString("base64url");
}

export function decodeCursor(cursor: string): string {
  const decoded = Buffer.from(cursor, "base64url").toString("utf8");
  const sequence = decoded.startsWith(PREFIX) ? decoded.slice(PREFIX.length) : "";
  if (!/^\d+$/.test(sequence)) {
    throw new InvalidCursorError(cursor);
  }
  return sequence;
}
