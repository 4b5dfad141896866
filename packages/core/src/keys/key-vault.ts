import type { DataKey, StoredDataKey } from "@phi-shield/shared";
import {
  AuditEventKind,
  DATA_KEY_MATERIAL_LENGTH,
  DOCUMENTATION_KEY_ID,
  EncryptionMode,
  ErrorCode,
  isPhiError,
  PhiError,
  SYSTEM_ACTOR,
} from "@phi-shield/shared";
import type { AuditSink } from "../audit/audit-logger.js";
import { generateDataKeyMaterial, unwrapDataKey, wrapDataKey } from "../crypto/key-hierarchy.js";
import { generateUUIDv7 } from "../crypto/random.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import type { KeyVaultStore } from "../storage/ports.js";

export interface KeyVaultOptions {
  store: KeyVaultStore;
  /** Required in enforced mode; ignored in documentation mode. */
  masterKey: Uint8Array | null;
  mode?: EncryptionMode;
  audit?: AuditSink;
  logger?: Logger;
}

/**
 * Named data keys, wrapped by the master key and created on first use. The
 * store's unique alt-name constraint is what settles concurrent creators.
 */
export class KeyVault {
  private readonly store: KeyVaultStore;
  private readonly masterKey: Uint8Array | null;
  private readonly mode: EncryptionMode;
  private readonly audit: AuditSink | undefined;
  private readonly logger: Logger;
  private readonly byId = new Map<string, DataKey>();
  private readonly byAltName = new Map<string, DataKey>();

  constructor(options: KeyVaultOptions) {
    this.store = options.store;
    this.masterKey = options.masterKey;
    this.mode = options.mode ?? EncryptionMode.ENFORCED;
    this.audit = options.audit;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "key-vault" });
  }

  get documentationMode(): boolean {
    return this.mode === EncryptionMode.DOCUMENTATION;
  }

  async getOrCreateDataKey(altName: string): Promise<DataKey> {
    if (this.documentationMode) return documentationKey(altName);

    const cached = this.byAltName.get(altName);
    if (cached) return cached;

    const existing = await this.call(() => this.store.findDataKeyByAltName(altName));
    if (existing) return this.remember(existing);

    const created = this.createStoredKey(altName);
    const outcome = await this.call(() => this.store.insertDataKey(created.stored));
    if (outcome === "ok") {
      this.logger.info("Created data key", { keyId: created.stored.id, altName });
      this.audit?.log(AuditEventKind.KEY_CREATE, SYSTEM_ACTOR, { keyId: created.stored.id, altName });
      return this.cache(created.key);
    }

    // Lost the race: someone else's key is now the only one for this alt name.
    const winner = await this.call(() => this.store.findDataKeyByAltName(altName));
    if (!winner) {
      throw PhiError.keyUnavailable(`data key "${altName}" conflicted on insert but cannot be found`);
    }
    this.logger.debug("Data key created concurrently; using existing", { keyId: winner.id, altName });
    return this.remember(winner);
  }

  /**
   * Resolve the key a cipher value's header names. An id the vault has never
   * issued means the value is unreadable here: DECRYPTION_FAILURE.
   */
  async getDataKeyById(id: string): Promise<DataKey> {
    if (this.documentationMode && id === DOCUMENTATION_KEY_ID) return documentationKey("");

    const cached = this.byId.get(id);
    if (cached) return cached;

    const stored = await this.call(() => this.store.findDataKeyById(id));
    if (!stored) {
      throw PhiError.decryptionFailure(`no data key with id ${id}`);
    }
    return this.remember(stored);
  }

  private requireMasterKey(): Uint8Array {
    if (!this.masterKey) {
      throw PhiError.keyUnavailable("no master key configured");
    }
    return this.masterKey;
  }

  private createStoredKey(altName: string): { stored: StoredDataKey; key: DataKey } {
    const id = generateUUIDv7();
    const material = generateDataKeyMaterial();
    const wrapped = wrapDataKey(this.requireMasterKey(), material, id);
    const createdAt = Date.now();
    return {
      stored: {
        id,
        alt_name: altName,
        wrapped_material: wrapped.wrappedMaterial,
        material_iv: wrapped.materialIv,
        material_tag: wrapped.materialTag,
        created_at: createdAt,
      },
      key: { id, altName, material, createdAt },
    };
  }

  private remember(stored: StoredDataKey): DataKey {
    let material: Uint8Array;
    try {
      material = unwrapDataKey(
        this.requireMasterKey(),
        {
          wrappedMaterial: stored.wrapped_material,
          materialIv: stored.material_iv,
          materialTag: stored.material_tag,
        },
        stored.id,
      );
    } catch (err) {
      if (isPhiError(err, ErrorCode.KEY_UNAVAILABLE)) throw err;
      throw PhiError.keyUnavailable(`data key ${stored.id} cannot be unwrapped with this master key`, err);
    }
    return this.cache({ id: stored.id, altName: stored.alt_name, material, createdAt: stored.created_at });
  }

  private cache(key: DataKey): DataKey {
    this.byId.set(key.id, key);
    this.byAltName.set(key.altName, key);
    return key;
  }

  // Store failures surface as KEY_UNAVAILABLE so callers fail closed.
  private async call<T>(fn: () => T | Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isPhiError(err, ErrorCode.KEY_UNAVAILABLE)) throw err;
      this.logger.error("Key vault store unavailable", err instanceof Error ? err : undefined);
      throw PhiError.keyUnavailable(
        `key vault store unavailable: ${err instanceof Error ? err.message : "unknown"}`,
        err,
      );
    }
  }
}

function documentationKey(altName: string): DataKey {
  return {
    id: DOCUMENTATION_KEY_ID,
    altName,
    material: new Uint8Array(DATA_KEY_MATERIAL_LENGTH),
    createdAt: 0,
  };
}
