// Facade
export { RecordVault, type RecordVaultOptions } from "./record-vault.js";

// Configuration
export { loadConfig, readJsonFile, type PhiConfig } from "./config/config.js";

// Keys
export { KeyVault, type KeyVaultOptions } from "./keys/key-vault.js";
export { createMasterKeyFile, loadMasterKey, type MasterKeySource, type MetaStore } from "./keys/master-key.js";

// Codec
export { EncryptionEngine, type EncryptionEngineOptions } from "./codec/encryption-engine.js";
export { DocumentCodec, type DocumentCodecOptions } from "./codec/document-codec.js";
export { canonicalize, decanonicalize, emptyComposite } from "./codec/canonical.js";
export { classify, fromStored, toStored, type StorageValue } from "./codec/storage-value.js";
export { CipherValue, isCipherValue, type CipherHeader } from "./crypto/cipher-value.js";

// Policy and access
export { FieldPolicy } from "./policy/field-policy.js";
export { RoleProjector, allowedFields, project } from "./access/role-projection.js";

// Entities
export type { EntityDefinition, FieldMap } from "./entities/entity.js";
export { ENTITIES, type EntityRecords } from "./entities/index.js";
export { newPatient, patientEntity, type NoteEntry, type Patient } from "./entities/patient.js";
export { MessageDirection, messageEntity, newMessage, type Message } from "./entities/message.js";
export { conversationEntity, newConversation, type Conversation } from "./entities/conversation.js";
export { EncryptedRepository } from "./repository/encrypted-repository.js";

// Storage
export { SqliteStore, type AuditFilter } from "./storage/sqlite-store.js";
export type {
  DocumentFilter,
  DocumentStore,
  KeyVaultStore,
  MaybePromise,
  StorageDocument,
  StoredValue,
} from "./storage/ports.js";

// Audit and logging
export { AuditLogger, deriveAuditKey, type AuditMetadata, type AuditSink } from "./audit/audit-logger.js";
export { AuditQuery, type AuditQueryOptions, type DecryptedAuditEvent } from "./audit/audit-query.js";
export { createLogger, createSilentLogger, type LogLevel, type Logger } from "./logging/logger.js";
