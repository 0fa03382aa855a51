import { ageOn } from "./dates";
import { ConfigurationError } from "./errors";
import type { RelatedPersonDef } from "./profile";
import { type AttributeValue, type PatientRecord, type ResourceHandle, referenceTo } from "./record";
import { buildPatient, buildRelatedPerson, type FactoryContext } from "./resources";

export type RelationshipKeyword = "parent" | "child" | "spouse" | "sibling" | "guardian" | "emergency";

export type RelationshipEdge = {
  relationship: RelationshipKeyword;
  inverse: RelationshipKeyword;
};

export const INVERSE_RELATIONSHIP: Readonly<Record<RelationshipKeyword, RelationshipKeyword>> = {
  parent: "child",
  child: "parent",
  spouse: "spouse",
  sibling: "sibling",
  guardian: "child",
  emergency: "emergency",
};

// HL7 v3 RoleCode
const ROLE_CODES: Readonly<Record<RelationshipKeyword, { code: string; display: string }>> = {
  parent: { code: "PRN", display: "parent" },
  child: { code: "CHILD", display: "child" },
  spouse: { code: "SPS", display: "spouse" },
  sibling: { code: "SIB", display: "sibling" },
  guardian: { code: "GUARD", display: "guardian" },
  emergency: { code: "C", display: "emergency contact" },
};

function isRelationshipKeyword(value: string): value is RelationshipKeyword {
  return Object.prototype.hasOwnProperty.call(INVERSE_RELATIONSHIP, value);
}

export function relationshipFor(raw: string): RelationshipEdge {
  const keyword = raw.trim().toLowerCase();
  if (!isRelationshipKeyword(keyword)) {
    throw new ConfigurationError(
      `Unknown relationship keyword "${raw}" (expected one of ${Object.keys(INVERSE_RELATIONSHIP).join(", ")})`
    );
  }
  return { relationship: keyword, inverse: INVERSE_RELATIONSHIP[keyword] };
}

function relationshipCoding(keyword: RelationshipKeyword) {
  return { ...ROLE_CODES[keyword], keyword };
}

export type RelatedPersonResult = {
  record: PatientRecord;
  /** RelatedPerson attached to the originating patient, describing the new person. */
  originLink: ResourceHandle;
  /** RelatedPerson attached to the new person, describing the originating patient. */
  relatedLink: ResourceHandle;
};

/**
 * Expand one `related_persons` directive into a Patient for the related
 * individual plus a RelatedPerson on each side, both inside the origin's group.
 */
export function resolveRelatedPerson(
  def: RelatedPersonDef,
  relationship: RelationshipKeyword,
  origin: PatientRecord,
  ctx: FactoryContext
): RelatedPersonResult {
  const edge: RelationshipEdge = { relationship, inverse: INVERSE_RELATIONSHIP[relationship] };
  const phone = def.contact?.phone ?? def.phone;
  const email = def.contact?.email ?? def.email;
  const gender = def.gender ?? "unknown";

  const mrn = def.identifiers?.length ? "" : `MRN-${ctx.rng.uuid().slice(0, 8)}`;
  const patient = buildPatient(
    { name: def.name, gender, birthDate: def.birthDate, identifiers: def.identifiers, phone, email },
    mrn
  );

  const attributes: Record<string, AttributeValue> = { gender };
  const age = ageOn(def.birthDate, ctx.referenceDate);
  if (age != null) attributes.age = age;
  Object.assign(attributes, def.attributes ?? {});

  const record = origin.group.createRecord(patient, attributes, origin.depth + 1);

  const originLink = origin.attach(
    buildRelatedPerson(
      {
        name: def.name,
        relationship: relationshipCoding(edge.relationship),
        gender: def.gender,
        birthDate: def.birthDate,
        identifiers: def.identifiers,
        phone,
        email,
        active: def.active,
      },
      referenceTo(origin.handle),
      referenceTo(record.handle)
    )
  );

  const originName = origin.patient.name[0];
  const relatedLink = record.attach(
    buildRelatedPerson(
      {
        name: originName,
        relationship: relationshipCoding(edge.inverse),
        gender: origin.patient.gender,
        birthDate: origin.patient.birthDate,
        identifiers: origin.patient.identifier,
      },
      referenceTo(record.handle),
      referenceTo(origin.handle)
    )
  );

  return { record, originLink, relatedLink };
}
