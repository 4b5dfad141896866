import type { FieldValue, ViewMap } from "@phi-shield/shared";
import { EntityKind, FieldType } from "@phi-shield/shared";
import {
  type EntityDefinition,
  formatDate,
  formatTimestamp,
  idField,
  readDate,
  readMapList,
  readString,
  readStringList,
  readStringMap,
  stringField,
  stringListField,
  stringMapField,
  timestampField,
} from "./entity.js";

export interface NoteEntry {
  content: string;
  authorId: string | null;
  authorName: string | null;
  createdAt: Date | null;
}

export interface Patient {
  id: string | null;
  patientId: string | null;
  firstName: string | null;
  lastName: string | null;
  email: string | null;
  phoneNumber: string | null;
  birthDate: Date | null;
  ssn: string | null;
  diagnosis: string[];
  medications: string[];
  insuranceDetails: Record<string, string>;
  notes: string | null;
  notesHistory: NoteEntry[];
  primaryDoctorId: string | null;
  createdAt: Date | null;
  updatedAt: Date | null;
}

export function newPatient(fields: Partial<Patient> = {}): Patient {
  return {
    id: null,
    patientId: null,
    firstName: null,
    lastName: null,
    email: null,
    phoneNumber: null,
    birthDate: null,
    ssn: null,
    diagnosis: [],
    medications: [],
    insuranceDetails: {},
    notes: null,
    notesHistory: [],
    primaryDoctorId: null,
    createdAt: null,
    updatedAt: null,
    ...fields,
  };
}

function noteToField(note: NoteEntry): FieldValue {
  const entries: { [key: string]: FieldValue } = { content: { kind: "string", value: note.content } };
  if (note.authorId !== null) entries.authorId = { kind: "id", value: note.authorId };
  if (note.authorName !== null) entries.authorName = { kind: "string", value: note.authorName };
  if (note.createdAt !== null) entries.createdAt = { kind: "timestamp", value: note.createdAt };
  return { kind: "map", entries };
}

function noteFromEntries(entries: { [key: string]: FieldValue }): NoteEntry {
  return {
    content: readString(entries.content) ?? "",
    authorId: readString(entries.authorId),
    authorName: readString(entries.authorName),
    createdAt: readDate(entries.createdAt),
  };
}

export const patientEntity: EntityDefinition<Patient> = {
  kind: EntityKind.PATIENT,
  collection: "patients",
  fields: {
    patientId: FieldType.ID,
    firstName: FieldType.STRING,
    lastName: FieldType.STRING,
    email: FieldType.STRING,
    phoneNumber: FieldType.STRING,
    birthDate: FieldType.TIMESTAMP,
    ssn: FieldType.STRING,
    diagnosis: FieldType.LIST,
    medications: FieldType.LIST,
    insuranceDetails: FieldType.MAP,
    notes: FieldType.STRING,
    notesHistory: FieldType.LIST,
    primaryDoctorId: FieldType.ID,
    createdAt: FieldType.TIMESTAMP,
    updatedAt: FieldType.TIMESTAMP,
  },

  toFields(p) {
    return {
      patientId: idField(p.patientId),
      firstName: stringField(p.firstName),
      lastName: stringField(p.lastName),
      email: stringField(p.email),
      phoneNumber: stringField(p.phoneNumber),
      birthDate: timestampField(p.birthDate),
      ssn: stringField(p.ssn),
      diagnosis: stringListField(p.diagnosis),
      medications: stringListField(p.medications),
      insuranceDetails: stringMapField(p.insuranceDetails),
      notes: stringField(p.notes),
      notesHistory: { kind: "list", items: p.notesHistory.map(noteToField) },
      primaryDoctorId: idField(p.primaryDoctorId),
      createdAt: timestampField(p.createdAt),
      updatedAt: timestampField(p.updatedAt),
    };
  },

  fromFields(id, f) {
    return {
      id,
      patientId: readString(f.patientId),
      firstName: readString(f.firstName),
      lastName: readString(f.lastName),
      email: readString(f.email),
      phoneNumber: readString(f.phoneNumber),
      birthDate: readDate(f.birthDate),
      ssn: readString(f.ssn),
      diagnosis: readStringList(f.diagnosis),
      medications: readStringList(f.medications),
      insuranceDetails: readStringMap(f.insuranceDetails),
      notes: readString(f.notes),
      notesHistory: readMapList(f.notesHistory).map(noteFromEntries),
      primaryDoctorId: readString(f.primaryDoctorId),
      createdAt: readDate(f.createdAt),
      updatedAt: readDate(f.updatedAt),
    };
  },

  toView(p): ViewMap {
    return {
      id: p.id,
      patientId: p.patientId,
      firstName: p.firstName,
      lastName: p.lastName,
      email: p.email,
      phoneNumber: p.phoneNumber,
      birthDate: formatDate(p.birthDate),
      ssn: p.ssn,
      diagnosis: [...p.diagnosis],
      medications: [...p.medications],
      insuranceDetails: { ...p.insuranceDetails },
      notes: p.notes,
      notesHistory: p.notesHistory.map((n) => ({
        content: n.content,
        authorId: n.authorId,
        authorName: n.authorName,
        createdAt: formatTimestamp(n.createdAt),
      })),
      primaryDoctorId: p.primaryDoctorId,
      createdAt: formatTimestamp(p.createdAt),
      updatedAt: formatTimestamp(p.updatedAt),
    };
  },

  stamp(p, now) {
    return { ...p, createdAt: p.createdAt ?? now, updatedAt: now };
  },
};
