import type { StoredDataKey } from "@phi-shield/shared";
import type { CipherValue } from "../crypto/cipher-value.js";

export type MaybePromise<T> = T | Promise<T>;

// ---------------------------------------------------------------------------
// Stored documents
// ---------------------------------------------------------------------------

export type StoredScalar = string | number | boolean | null | Date;

/** A value as it sits in a stored document: plaintext, cipher blob, or a composite of those. */
export type StoredValue = StoredScalar | CipherValue | StoredValue[] | { [key: string]: StoredValue };

export type StorageDocument = { [field: string]: StoredValue };

/** Exact-match filter: every listed field must equal the given stored value. */
export type DocumentFilter = { [field: string]: StoredValue };

export const ID_FIELD = "_id";

// ---------------------------------------------------------------------------
// Ports
// ---------------------------------------------------------------------------

/** Backing store for data keys. `alt_name` must be unique. */
export interface KeyVaultStore {
  findDataKeyByAltName(altName: string): MaybePromise<StoredDataKey | undefined>;
  findDataKeyById(id: string): MaybePromise<StoredDataKey | undefined>;
  /** Returns `"conflict"` when a key with the same alt name already exists. */
  insertDataKey(key: StoredDataKey): MaybePromise<"ok" | "conflict">;
}

export interface DocumentStore {
  getDocument(collection: string, id: string): MaybePromise<StorageDocument | undefined>;
  findDocuments(collection: string, filter: DocumentFilter): MaybePromise<StorageDocument[]>;
  /** Insert or replace by `_id`; assigns one when absent. Returns the id. */
  putDocument(collection: string, doc: StorageDocument): MaybePromise<string>;
}
