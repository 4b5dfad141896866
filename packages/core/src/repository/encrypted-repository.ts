import type { FieldValue } from "@phi-shield/shared";
import { PhiError } from "@phi-shield/shared";
import type { DocumentCodec } from "../codec/document-codec.js";
import { generateUUIDv7 } from "../crypto/random.js";
import type { EntityDefinition } from "../entities/entity.js";
import type { DocumentStore } from "../storage/ports.js";

/**
 * Records of one entity kind, persisted through the document store port.
 * Every write and read goes through the codec.
 */
export class EncryptedRepository<R extends { id: string | null }> {
  constructor(
    private readonly entity: EntityDefinition<R>,
    private readonly codec: DocumentCodec,
    private readonly store: DocumentStore,
  ) {}

  /** Assigns an id to new records and stamps timestamps. Returns the saved record. */
  async save(record: R): Promise<R> {
    const stamped = this.entity.stamp({ ...record, id: record.id ?? generateUUIDv7() }, new Date());
    const doc = await this.codec.toStorage(this.entity, stamped);
    await this.store.putDocument(this.entity.collection, doc);
    return stamped;
  }

  async get(id: string): Promise<R | undefined> {
    const doc = await this.store.getDocument(this.entity.collection, id);
    return doc ? this.codec.fromStorage(this.entity, doc) : undefined;
  }

  /** @throws PhiError RECORD_NOT_FOUND */
  async require(id: string): Promise<R> {
    const record = await this.get(id);
    if (!record) throw PhiError.recordNotFound(this.entity.collection, id);
    return record;
  }

  /**
   * Records whose `fieldName` equals `value` exactly.
   *
   * @throws PhiError FIELD_NOT_SEARCHABLE for randomly encrypted fields
   */
  async findBy(fieldName: string, value: FieldValue | null): Promise<R[]> {
    const filter = await this.codec.equalityFilter(this.entity, fieldName, value);
    const docs = await this.store.findDocuments(this.entity.collection, filter);
    return Promise.all(docs.map((doc) => this.codec.fromStorage(this.entity, doc)));
  }

  async list(): Promise<R[]> {
    const docs = await this.store.findDocuments(this.entity.collection, {});
    return Promise.all(docs.map((doc) => this.codec.fromStorage(this.entity, doc)));
  }
}
