/**
 * Purpose: wrap CRUD operations over a Mongo collection, validating every read with
 * Zod so corrupt documents never reach the services.
 * Role: base layer for the binding and heist-ledger repositories.
 * Invariants: every document has `_id: string`; no method throws, errors travel as
 * `Result`; `parse` never throws and returns `null` for a document that fails the
 * schema (logged).
 */
import type {
  Collection,
  Document,
  Filter,
  OptionalUnlessRequiredId,
  UpdateFilter,
} from "mongodb";
import type { ZodType, ZodTypeDef } from "zod";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { getDb } from "./mongo";

const DUPLICATE_KEY_CODE = 11000;

/** True when a write failed on a unique index. */
export function isDuplicateKeyError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === DUPLICATE_KEY_CODE
  );
}

/**
 * Generic store with defensive validation.
 *
 * RISK: a document that fails validation is treated as absent; watch the
 * `invalid document` logs after a schema change.
 */
export class MongoStore<T extends Document & { _id: string }> {
  constructor(
    private readonly collectionName: string,
    private readonly schema: ZodType<T, ZodTypeDef, unknown>,
  ) {}

  /** Decouples the methods below from the connection mechanism. */
  public async collection(): Promise<Collection<T>> {
    return (await getDb()).collection<T>(this.collectionName);
  }

  parse(doc: unknown): T | null {
    const parsed = this.schema.safeParse(doc);
    if (parsed.success) return parsed.data;

    const id =
      typeof doc === "object" && doc !== null && "_id" in doc
        ? String(doc._id)
        : "unknown";
    console.error(`[MongoStore:${this.collectionName}] invalid document; ignoring`, {
      id,
      error: parsed.error,
    });
    return null;
  }

  async findOne(filter: Filter<T>): Promise<Result<T | null>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne(filter);
      return OkResult(doc ? this.parse(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  /**
   * Inserts a new document. A unique-index violation comes back as `Err`; use
   * `isDuplicateKeyError` on it to tell races apart from outages.
   */
  async insert(doc: T): Promise<Result<T>> {
    try {
      const col = await this.collection();
      await col.insertOne(doc as OptionalUnlessRequiredId<T>);
      return OkResult(doc);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  /** Sets fields by dot-path. Returns whether a document matched. */
  async updatePaths(
    id: string,
    paths: Record<string, unknown>,
  ): Promise<Result<boolean>> {
    try {
      const col = await this.collection();
      const res = await col.updateOne(
        { _id: id } as Filter<T>,
        { $set: paths } as UpdateFilter<T>,
      );
      return OkResult(res.matchedCount > 0);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async deleteWhere(filter: Filter<T>): Promise<Result<number>> {
    try {
      const col = await this.collection();
      const res = await col.deleteMany(filter);
      return OkResult(res.deletedCount ?? 0);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async count(filter: Filter<T>): Promise<Result<number>> {
    try {
      const col = await this.collection();
      return OkResult(await col.countDocuments(filter));
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}
