import type { EntityKind, ViewMap } from "@phi-shield/shared";
import { AuditEventKind, EncryptionMode, SYSTEM_ACTOR } from "@phi-shield/shared";
import { AuditLogger, type AuditSink, deriveAuditKey } from "./audit/audit-logger.js";
import { AuditQuery, type AuditQueryOptions, type DecryptedAuditEvent } from "./audit/audit-query.js";
import { DocumentCodec } from "./codec/document-codec.js";
import { EncryptionEngine } from "./codec/encryption-engine.js";
import type { PhiConfig } from "./config/config.js";
import type { Argon2Params } from "./crypto/argon2.js";
import { wipeBuffer } from "./crypto/random.js";
import type { Conversation } from "./entities/conversation.js";
import { ENTITIES, type EntityRecords } from "./entities/index.js";
import type { Message } from "./entities/message.js";
import type { Patient } from "./entities/patient.js";
import { KeyVault } from "./keys/key-vault.js";
import { loadMasterKey } from "./keys/master-key.js";
import { createLogger, type Logger } from "./logging/logger.js";
import { EncryptedRepository } from "./repository/encrypted-repository.js";
import { SqliteStore } from "./storage/sqlite-store.js";

export interface RecordVaultOptions {
  logger?: Logger;
  /** Replaces the built-in `audit_log` writer. */
  auditSink?: AuditSink;
  /** Overrides Argon2id cost for passphrase-derived master keys. */
  argon2?: Argon2Params;
}

/**
 * Entry point: opens the store, resolves the master key, and wires key vault,
 * engine, codec and repositories for each entity kind.
 */
export class RecordVault {
  readonly patients: EncryptedRepository<Patient>;
  readonly messages: EncryptedRepository<Message>;
  readonly conversations: EncryptedRepository<Conversation>;

  private constructor(
    private readonly config: PhiConfig,
    private readonly store: SqliteStore,
    private readonly masterKey: Uint8Array | null,
    private readonly auditKey: Uint8Array | null,
    readonly keyVault: KeyVault,
    readonly codec: DocumentCodec,
  ) {
    this.patients = new EncryptedRepository(ENTITIES.patient, codec, store);
    this.messages = new EncryptedRepository(ENTITIES.message, codec, store);
    this.conversations = new EncryptedRepository(ENTITIES.conversation, codec, store);
  }

  /** @throws PhiError KEY_UNAVAILABLE when the master key cannot be resolved */
  static async open(config: PhiConfig, options: RecordVaultOptions = {}): Promise<RecordVault> {
    const logger = options.logger ?? createLogger({ level: config.logLevel });
    const store = new SqliteStore(config.dbPath);

    try {
      const documentation = config.mode === EncryptionMode.DOCUMENTATION;
      let masterKey: Uint8Array | null = null;
      if (!documentation && config.masterKey) {
        const source =
          config.masterKey.kind === "passphrase" && options.argon2
            ? { ...config.masterKey, argon2: options.argon2 }
            : config.masterKey;
        masterKey = await loadMasterKey(source, store);
      }

      const auditKey = masterKey ? await deriveAuditKey(masterKey) : null;
      const audit = options.auditSink ?? new AuditLogger(store, auditKey);

      if (documentation) {
        logger.warn("Field encryption is disabled: documentation mode stores PHI in plaintext", {
          mode: config.mode,
        });
        audit.log(AuditEventKind.ENCRYPTION_DISABLED, SYSTEM_ACTOR, { mode: config.mode });
      }

      const keyVault = new KeyVault({ store, masterKey, mode: config.mode, audit, logger });
      const engine = new EncryptionEngine({
        policy: config.fieldPolicy,
        keyVault,
        keyAltName: config.keyAltName,
        audit,
        logger,
      });
      const codec = new DocumentCodec({ engine, policy: config.fieldPolicy, audit, logger });

      logger.info("Record vault opened", { mode: config.mode, keyAltName: config.keyAltName });
      return new RecordVault(config, store, masterKey, auditKey, keyVault, codec);
    } catch (err) {
      store.close();
      throw err;
    }
  }

  /** Role-scoped view of a decrypted record. */
  project<K extends EntityKind>(kind: K, record: EntityRecords[K], roles: readonly string[]): ViewMap {
    const entity = ENTITIES[kind];
    return this.config.roleProjector.project(kind, entity.toView(record), roles);
  }

  auditLog(options?: AuditQueryOptions): DecryptedAuditEvent[] {
    return new AuditQuery(this.store, this.auditKey).query(options);
  }

  close(): void {
    if (this.masterKey) wipeBuffer(this.masterKey);
    if (this.auditKey) wipeBuffer(this.auditKey);
    this.store.close();
  }
}
