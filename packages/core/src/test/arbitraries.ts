import fc from "fast-check";
import type { FieldValue, ScalarValue } from "@phi-shield/shared";
import type { NoteEntry, Patient } from "../entities/patient.js";
import { newPatient } from "../entities/patient.js";
import type { StoredValue } from "../storage/ports.js";

// Canonical JSON writes -0 as 0, so composites only ever hold +0.
const finiteArb = fc.double({ noNaN: true, noDefaultInfinity: true }).map((n) => (Object.is(n, -0) ? 0 : n));

export const dateArb = fc.date({
  min: new Date("1900-01-01T00:00:00.000Z"),
  max: new Date("2100-01-01T00:00:00.000Z"),
  noInvalidDate: true,
});

const nullable = <T>(arb: fc.Arbitrary<T>): fc.Arbitrary<T | null> => fc.option(arb, { nil: null });

/** Map keys, including ones that collide with the extended JSON markers. */
export const mapKeyArb = fc.oneof(
  fc.stringMatching(/^[a-zA-Z][a-zA-Z0-9_]{0,11}$/),
  fc.constantFrom("$date", "$oid", "$map", "$binary"),
);

export const scalarArb: fc.Arbitrary<ScalarValue> = fc.oneof(
  fc.fullUnicodeString().map((value): ScalarValue => ({ kind: "string", value })),
  finiteArb.map((value): ScalarValue => ({ kind: "number", value })),
  fc.boolean().map((value): ScalarValue => ({ kind: "boolean", value })),
  dateArb.map((value): ScalarValue => ({ kind: "timestamp", value })),
  fc.uuid().map((value): ScalarValue => ({ kind: "id", value })),
);

export const fieldValueArb: fc.Arbitrary<FieldValue> = fc.letrec<{ value: FieldValue }>((tie) => ({
  value: fc.oneof(
    { depthSize: "small", withCrossShrink: true },
    scalarArb,
    fc.array(tie("value"), { maxLength: 4 }).map((items): FieldValue => ({ kind: "list", items })),
    fc
      .dictionary(mapKeyArb, tie("value"), { maxKeys: 4 })
      .map((entries): FieldValue => ({ kind: "map", entries })),
  ),
})).value;

const noteArb: fc.Arbitrary<NoteEntry> = fc.record({
  content: fc.string(),
  authorId: nullable(fc.uuid()),
  authorName: nullable(fc.string()),
  createdAt: nullable(dateArb),
});

export const patientArb: fc.Arbitrary<Patient> = fc
  .record({
    id: fc.uuid(),
    patientId: nullable(fc.string({ minLength: 1 })),
    firstName: nullable(fc.string()),
    lastName: nullable(fc.string()),
    email: nullable(fc.emailAddress()),
    phoneNumber: nullable(fc.string()),
    birthDate: nullable(dateArb),
    ssn: nullable(fc.stringMatching(/^\d{3}-\d{2}-\d{4}$/)),
    diagnosis: fc.array(fc.string(), { maxLength: 4 }),
    medications: fc.array(fc.string(), { maxLength: 4 }),
    insuranceDetails: fc.dictionary(mapKeyArb, fc.string(), { maxKeys: 4 }),
    notes: nullable(fc.string()),
    notesHistory: fc.array(noteArb, { maxLength: 3 }),
    primaryDoctorId: nullable(fc.uuid()),
    createdAt: nullable(dateArb),
    updatedAt: nullable(dateArb),
  })
  .map((fields) => newPatient(fields));

/** Whatever an older writer or a hand edit may have left in a document field. */
export const storedJunkArb: fc.Arbitrary<StoredValue> = fc.oneof(
  fc.string(),
  finiteArb,
  fc.boolean(),
  fc.constant(null),
  dateArb,
  fc.array(fc.oneof(fc.string(), fc.integer(), fc.constant(null)), { maxLength: 4 }),
  fc.dictionary(mapKeyArb, fc.oneof(fc.string(), fc.integer(), fc.constant(null)), { maxKeys: 4 }),
);
