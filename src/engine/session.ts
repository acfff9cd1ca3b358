import { LimitError } from "@/errors";
import type { StoredFile } from "@/storage";
import { Err, Ok, type Result } from "@/utils";
import type { FieldEntry, MixedKeysPolicy, ParseResult } from "./types";

export type SessionState = "idle" | "parsing" | "completed" | "aborted";

/**
 * Mutable state of one parse. Created per request and discarded once it
 * reaches `completed` or `aborted`.
 */
export class ParseSession<TFile extends StoredFile> {
  private current: SessionState = "idle";
  private partIndex = 0;
  private readonly fileKeys = new Set<string>();
  private readonly fieldKeys = new Set<string>();
  readonly files: TFile[] = [];
  readonly entries: FieldEntry[] = [];

  constructor(private readonly mixedKeys: MixedKeysPolicy) {}

  get state(): SessionState {
    return this.current;
  }

  start(): void {
    this.transition("idle", "parsing");
  }

  complete(): void {
    this.transition("parsing", "completed");
  }

  /** Aborting is allowed from any non-terminal state */
  abort(): void {
    if (this.current === "completed" || this.current === "aborted") {
      throw new Error(`cannot abort a ${this.current} session`);
    }
    this.current = "aborted";
  }

  /** Ordinal of the next part, starting at 0 */
  nextIndex(): number {
    const index = this.partIndex;
    this.partIndex += 1;
    return index;
  }

  /** Registers a name for a file part or a plain field, enforcing the mixed-keys policy */
  claimKey(name: string, isFile: boolean): Result<void, LimitError> {
    const other = isFile ? this.fieldKeys : this.fileKeys;
    if (this.mixedKeys === "reject" && other.has(name)) {
      return Err(
        new LimitError(
          "MIXED_KEYS",
          `field '${name}' is used for both files and values`,
          { data: { field: name } }
        )
      );
    }
    (isFile ? this.fileKeys : this.fieldKeys).add(name);
    return Ok(undefined);
  }

  addFile(file: TFile): void {
    this.files.push(file);
  }

  addField(entry: FieldEntry): void {
    this.entries.push(entry);
  }

  toResult(): ParseResult<TFile> {
    const grouped = new Map<string, string | string[]>();
    for (const { name, value } of this.entries) {
      const existing = grouped.get(name);
      if (existing === undefined) {
        grouped.set(name, value);
      } else if (Array.isArray(existing)) {
        existing.push(value);
      } else {
        grouped.set(name, [existing, value]);
      }
    }

    return {
      files: [...this.files],
      fields: Object.fromEntries(grouped),
      entries: this.entries.map((entry) => ({ ...entry })),
    };
  }

  private transition(from: SessionState, to: SessionState): void {
    if (this.current !== from) {
      throw new Error(`invalid session transition ${this.current} -> ${to}`);
    }
    this.current = to;
  }
}
