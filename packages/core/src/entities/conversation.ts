import type { ViewMap } from "@phi-shield/shared";
import { EntityKind, FieldType } from "@phi-shield/shared";
import {
  booleanField,
  type EntityDefinition,
  formatTimestamp,
  idField,
  numberField,
  readBoolean,
  readDate,
  readNumber,
  readString,
  readStringList,
  stringField,
  stringListField,
  timestampField,
} from "./entity.js";

export interface Conversation {
  id: string | null;
  patientId: string | null;
  subject: string | null;
  /** User ids taking part. */
  participants: string[];
  status: string;
  lastMessagePreview: string | null;
  createdAt: Date | null;
  lastMessageAt: Date | null;
  messageCount: number;
  hasUnreadForPatient: boolean;
  hasUnreadForStaff: boolean;
}

export function newConversation(fields: Partial<Conversation> = {}): Conversation {
  return {
    id: null,
    patientId: null,
    subject: null,
    participants: [],
    status: "active",
    lastMessagePreview: null,
    createdAt: null,
    lastMessageAt: null,
    messageCount: 0,
    hasUnreadForPatient: false,
    hasUnreadForStaff: false,
    ...fields,
  };
}

export const conversationEntity: EntityDefinition<Conversation> = {
  kind: EntityKind.CONVERSATION,
  collection: "conversations",
  fields: {
    patientId: FieldType.ID,
    subject: FieldType.STRING,
    participants: FieldType.LIST,
    status: FieldType.STRING,
    lastMessagePreview: FieldType.STRING,
    createdAt: FieldType.TIMESTAMP,
    lastMessageAt: FieldType.TIMESTAMP,
    messageCount: FieldType.NUMBER,
    hasUnreadForPatient: FieldType.BOOLEAN,
    hasUnreadForStaff: FieldType.BOOLEAN,
  },

  toFields(c) {
    return {
      patientId: idField(c.patientId),
      subject: stringField(c.subject),
      participants: stringListField(c.participants),
      status: stringField(c.status),
      lastMessagePreview: stringField(c.lastMessagePreview),
      createdAt: timestampField(c.createdAt),
      lastMessageAt: timestampField(c.lastMessageAt),
      messageCount: numberField(c.messageCount),
      hasUnreadForPatient: booleanField(c.hasUnreadForPatient),
      hasUnreadForStaff: booleanField(c.hasUnreadForStaff),
    };
  },

  fromFields(id, f) {
    return {
      id,
      patientId: readString(f.patientId),
      subject: readString(f.subject),
      participants: readStringList(f.participants),
      status: readString(f.status) ?? "active",
      lastMessagePreview: readString(f.lastMessagePreview),
      createdAt: readDate(f.createdAt),
      lastMessageAt: readDate(f.lastMessageAt),
      messageCount: readNumber(f.messageCount, 0),
      hasUnreadForPatient: readBoolean(f.hasUnreadForPatient, false),
      hasUnreadForStaff: readBoolean(f.hasUnreadForStaff, false),
    };
  },

  toView(c): ViewMap {
    return {
      id: c.id,
      patientId: c.patientId,
      subject: c.subject,
      participants: [...c.participants],
      status: c.status,
      lastMessagePreview: c.lastMessagePreview,
      createdAt: formatTimestamp(c.createdAt),
      lastMessageAt: formatTimestamp(c.lastMessageAt),
      messageCount: c.messageCount,
      hasUnreadForPatient: c.hasUnreadForPatient,
      hasUnreadForStaff: c.hasUnreadForStaff,
    };
  },

  stamp(c, now) {
    return { ...c, createdAt: c.createdAt ?? now, lastMessageAt: c.lastMessageAt ?? c.createdAt ?? now };
  },
};
