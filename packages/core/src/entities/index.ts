import type { EntityKind } from "@phi-shield/shared";
import { type Conversation, conversationEntity } from "./conversation.js";
import type { EntityDefinition } from "./entity.js";
import { type Message, messageEntity } from "./message.js";
import { type Patient, patientEntity } from "./patient.js";

export interface EntityRecords {
  patient: Patient;
  message: Message;
  conversation: Conversation;
}

export const ENTITIES: { readonly [K in EntityKind]: EntityDefinition<EntityRecords[K]> } = {
  patient: patientEntity,
  message: messageEntity,
  conversation: conversationEntity,
};
