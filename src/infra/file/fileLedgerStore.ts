import { randomUUID } from "crypto";
import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import path from "path";
import { StorageError } from "../../common/errors";
import { emptyLedgerState, LedgerState } from "../../modules/ledger/repository";
import { decodeWorkbook, encodeWorkbook } from "../../modules/ledger/workbook";
import { MemoryLedgerStore } from "../memory/memoryLedgerStore";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Ledger kept in a single workbook file holding both tables. Every commit
 * writes a temporary sibling and renames it over the file, so the file always
 * holds either the previous or the new ledger.
 */
export class FileLedgerStore extends MemoryLedgerStore {
  constructor(private readonly filePath: string) {
    super();
  }

  protected async load(): Promise<LedgerState> {
    let bytes: Buffer;
    try {
      bytes = await readFile(this.filePath);
    } catch (error) {
      if (isMissingFile(error)) {
        const empty = emptyLedgerState();
        await this.persist(empty);
        return empty;
      }
      throw new StorageError(`Failed to read ledger file ${this.filePath}`, { cause: error });
    }

    try {
      return decodeWorkbook(bytes);
    } catch (error) {
      throw new StorageError(`Ledger file ${this.filePath} is not a valid workbook`, {
        cause: error
      });
    }
  }

  protected async persist(next: LedgerState): Promise<void> {
    const tempPath = `${this.filePath}.${randomUUID()}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
    } catch (error) {
      throw new StorageError(`Failed to create ledger directory for ${this.filePath}`, {
        cause: error
      });
    }

    try {
      await writeFile(tempPath, encodeWorkbook(next));
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new StorageError(`Failed to write ledger file ${this.filePath}`, { cause: error });
    }
  }

  async exportSnapshot(): Promise<Buffer> {
    await this.current();
    try {
      return await readFile(this.filePath);
    } catch (error) {
      throw new StorageError(`Failed to read ledger file ${this.filePath}`, { cause: error });
    }
  }
}
