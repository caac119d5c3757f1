/**
 * DNS PTR record — State Stores
 *
 * In-memory store for engines and tests, and a JSON-file store for the CLI.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { validatePtrRecordStateSnapshot } from "./schema.js";
import type { PtrRecordAttributes, PtrRecordStateSnapshot, PtrRecordStateStore } from "./types.js";

function copyAttributes(attributes: PtrRecordAttributes): PtrRecordAttributes {
  return { ...attributes, records: [...attributes.records], tags: { ...attributes.tags } };
}

export class InMemoryPtrRecordState implements PtrRecordStateStore {
  protected id: string | undefined;
  protected attributes: PtrRecordAttributes | undefined;

  constructor(snapshot: PtrRecordStateSnapshot = {}) {
    this.id = snapshot.id;
    this.attributes = snapshot.attributes ? copyAttributes(snapshot.attributes) : undefined;
  }

  getId(): string | undefined {
    return this.id;
  }

  setId(id: string): void {
    this.id = id;
    this.changed();
  }

  get(): PtrRecordAttributes | undefined {
    return this.attributes ? copyAttributes(this.attributes) : undefined;
  }

  set(attributes: PtrRecordAttributes): void {
    this.attributes = copyAttributes(attributes);
    this.changed();
  }

  clear(): void {
    this.id = undefined;
    this.attributes = undefined;
    this.changed();
  }

  toJSON(): PtrRecordStateSnapshot {
    const snapshot: PtrRecordStateSnapshot = {};
    if (this.id !== undefined) snapshot.id = this.id;
    if (this.attributes) snapshot.attributes = copyAttributes(this.attributes);
    return snapshot;
  }

  /** Hook for persistent subclasses; called after every mutation. */
  protected changed(): void {}
}

/**
 * State persisted to a JSON file, written through on every mutation.
 */
export class FilePtrRecordState extends InMemoryPtrRecordState {
  readonly path: string;

  private constructor(path: string, snapshot: PtrRecordStateSnapshot) {
    super(snapshot);
    this.path = path;
  }

  /** Load the state file; a missing file is an empty state. */
  static load(path: string): FilePtrRecordState {
    if (!existsSync(path)) return new FilePtrRecordState(path, {});

    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    validatePtrRecordStateSnapshot(parsed);
    return new FilePtrRecordState(path, parsed);
  }

  protected override changed(): void {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, `${JSON.stringify(this.toJSON(), null, 2)}\n`, "utf-8");
  }
}
