import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { KeyValueStore } from "./types";
import { paths } from "../config/paths";

type StoreContents = Record<string, string>;

/**
 * Key-value pairs kept in one JSON object file. Every call goes back to disk, so
 * separate processes sharing the file see each other's writes.
 */
export class FileKeyValueStore implements KeyValueStore {
  readonly name = "file";
  private readonly filePath: string;

  constructor(filePath: string = paths.ledgerStore) {
    this.filePath = filePath;
    mkdirSync(dirname(filePath), { recursive: true });
  }

  async get(key: string): Promise<string | undefined> {
    const contents = this.read();
    return Object.prototype.hasOwnProperty.call(contents, key) ? contents[key] : undefined;
  }

  async set(key: string, value: string): Promise<void> {
    const contents = this.read();
    contents[key] = value;
    this.write(contents);
  }

  async delete(key: string): Promise<void> {
    const contents = this.read();
    if (!Object.prototype.hasOwnProperty.call(contents, key)) {
      return;
    }
    delete contents[key];
    this.write(contents);
  }

  private read(): StoreContents {
    if (!existsSync(this.filePath)) {
      return {};
    }
    const raw = readFileSync(this.filePath, "utf8").trim();
    if (!raw) {
      return {};
    }

    const parsed: unknown = JSON.parse(raw);
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new Error(`Store file '${this.filePath}' does not hold a JSON object`);
    }

    const contents: StoreContents = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === "string") {
        contents[key] = value;
      }
    }
    return contents;
  }

  private write(contents: StoreContents): void {
    const tempPath = `${this.filePath}.tmp`;
    writeFileSync(tempPath, `${JSON.stringify(contents, null, 2)}\n`, "utf8");
    renameSync(tempPath, this.filePath);
  }
}
