import { VorbisComment } from "./blocks.ts";

function keyOf(comment: string): string | undefined {
  const eq = comment.indexOf("=");
  return eq > 0 ? comment.slice(0, eq) : undefined;
}

/**
 * Ordered `KEY=value` entries of a single vorbis comment block.
 *
 * Writes match keys case-insensitively and keep one entry per key, moved to
 * the end. `get` only matches the exact key, so callers use the canonical
 * uppercase names on both sides.
 */
export class CommentMap {
  constructor(public vendor: string, public entries: string[] = []) {}

  static fromBlock(block: VorbisComment | undefined, vendor: string) {
    return block
      ? new CommentMap(block.vendor, [...block.comments])
      : new CommentMap(vendor);
  }

  set(key: string, value: string) {
    if (value === "") return;
    const wanted = key.toUpperCase();
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (keyOf(this.entries[i])?.toUpperCase() === wanted) {
        this.entries.splice(i, 1);
      }
    }
    this.entries.push(`${key}=${value}`);
  }

  get(key: string): string {
    const prefix = `${key}=`;
    for (const entry of this.entries) {
      if (entry.length > prefix.length && entry.startsWith(prefix)) {
        return entry.slice(prefix.length);
      }
    }
    return "";
  }

  getAll(key: string): string[] {
    const wanted = key.toUpperCase();
    const values: string[] = [];
    for (const entry of this.entries) {
      const entryKey = keyOf(entry);
      if (entryKey === undefined || entryKey.toUpperCase() !== wanted) {
        continue;
      }
      const value = entry.slice(entryKey.length + 1);
      if (value !== "") values.push(value);
    }
    return values;
  }

  toBlock(): VorbisComment {
    return new VorbisComment(this.vendor, [...this.entries]);
  }
}
