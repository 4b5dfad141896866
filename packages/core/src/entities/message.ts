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

export const MessageDirection = {
  TO_PATIENT: "to_patient",
  TO_STAFF: "to_staff",
} as const;
export type MessageDirection = (typeof MessageDirection)[keyof typeof MessageDirection];

export interface Message {
  id: string | null;
  patientId: string | null;
  senderUserId: string | null;
  senderName: string | null;
  senderRoles: string[];
  direction: MessageDirection;
  recipientRoles: string[];
  subject: string | null;
  body: string | null;
  conversationId: string | null;
  parentMessageId: string | null;
  /** 0 for a top-level message, 1+ for replies. */
  threadLevel: number;
  readByPatient: boolean;
  readByStaff: boolean;
  createdAt: Date | null;
  updatedAt: Date | null;
}

export function newMessage(fields: Partial<Message> = {}): Message {
  return {
    id: null,
    patientId: null,
    senderUserId: null,
    senderName: null,
    senderRoles: [],
    direction: MessageDirection.TO_STAFF,
    recipientRoles: [],
    subject: null,
    body: null,
    conversationId: null,
    parentMessageId: null,
    threadLevel: 0,
    readByPatient: false,
    readByStaff: false,
    createdAt: null,
    updatedAt: null,
    ...fields,
  };
}

function readDirection(value: string | null): MessageDirection {
  return value === MessageDirection.TO_PATIENT ? MessageDirection.TO_PATIENT : MessageDirection.TO_STAFF;
}

export const messageEntity: EntityDefinition<Message> = {
  kind: EntityKind.MESSAGE,
  collection: "messages",
  fields: {
    patientId: FieldType.ID,
    senderUserId: FieldType.ID,
    senderName: FieldType.STRING,
    senderRoles: FieldType.LIST,
    direction: FieldType.STRING,
    recipientRoles: FieldType.LIST,
    subject: FieldType.STRING,
    body: FieldType.STRING,
    conversationId: FieldType.ID,
    parentMessageId: FieldType.ID,
    threadLevel: FieldType.NUMBER,
    readByPatient: FieldType.BOOLEAN,
    readByStaff: FieldType.BOOLEAN,
    createdAt: FieldType.TIMESTAMP,
    updatedAt: FieldType.TIMESTAMP,
  },

  toFields(m) {
    return {
      patientId: idField(m.patientId),
      senderUserId: idField(m.senderUserId),
      senderName: stringField(m.senderName),
      senderRoles: stringListField(m.senderRoles),
      direction: stringField(m.direction),
      recipientRoles: stringListField(m.recipientRoles),
      subject: stringField(m.subject),
      body: stringField(m.body),
      conversationId: idField(m.conversationId),
      parentMessageId: idField(m.parentMessageId),
      threadLevel: numberField(m.threadLevel),
      readByPatient: booleanField(m.readByPatient),
      readByStaff: booleanField(m.readByStaff),
      createdAt: timestampField(m.createdAt),
      updatedAt: timestampField(m.updatedAt),
    };
  },

  fromFields(id, f) {
    return {
      id,
      patientId: readString(f.patientId),
      senderUserId: readString(f.senderUserId),
      senderName: readString(f.senderName),
      senderRoles: readStringList(f.senderRoles),
      direction: readDirection(readString(f.direction)),
      recipientRoles: readStringList(f.recipientRoles),
      subject: readString(f.subject),
      body: readString(f.body),
      conversationId: readString(f.conversationId),
      parentMessageId: readString(f.parentMessageId),
      threadLevel: readNumber(f.threadLevel, 0),
      readByPatient: readBoolean(f.readByPatient, false),
      readByStaff: readBoolean(f.readByStaff, false),
      createdAt: readDate(f.createdAt),
      updatedAt: readDate(f.updatedAt),
    };
  },

  toView(m): ViewMap {
    return {
      id: m.id,
      patientId: m.patientId,
      senderUserId: m.senderUserId,
      senderName: m.senderName,
      senderRoles: [...m.senderRoles],
      direction: m.direction,
      recipientRoles: [...m.recipientRoles],
      subject: m.subject,
      body: m.body,
      conversationId: m.conversationId,
      parentMessageId: m.parentMessageId,
      threadLevel: m.threadLevel,
      readByPatient: m.readByPatient,
      readByStaff: m.readByStaff,
      createdAt: formatTimestamp(m.createdAt),
      updatedAt: formatTimestamp(m.updatedAt),
    };
  },

  stamp(m, now) {
    return { ...m, createdAt: m.createdAt ?? now, updatedAt: now };
  },
};
