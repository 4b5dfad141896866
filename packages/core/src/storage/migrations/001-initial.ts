import {
  CREATE_AUDIT_LOG,
  CREATE_AUDIT_LOG_INDEXES,
  CREATE_DOCUMENTS,
  CREATE_DOCUMENTS_INDEXES,
  CREATE_KEY_VAULT,
  CREATE_STORE_META,
} from "../schema.js";

export const migration001 = {
  version: 1,
  up: [
    CREATE_STORE_META,
    CREATE_KEY_VAULT,
    CREATE_DOCUMENTS,
    CREATE_DOCUMENTS_INDEXES,
    CREATE_AUDIT_LOG,
    CREATE_AUDIT_LOG_INDEXES,
  ].join("\n"),
};
