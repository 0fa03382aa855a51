import type { FhirResource, Patient, Reference, ResourceType } from "@cohortgen/shared";

export type AttributeValue = number | string | boolean;

export type AttributeView = Readonly<Record<string, AttributeValue>>;

/** Placeholder written into Reference.reference until the assembler assigns ids. */
export type DraftReference = `draft:${number}:${number}`;

export type ResourceHandle = {
  group: number;
  ordinal: number;
  resourceType: ResourceType;
};

export type DraftResource = {
  handle: ResourceHandle;
  resource: FhirResource;
};

export const RESOURCE_TYPES: readonly ResourceType[] = [
  "Patient",
  "Condition",
  "Observation",
  "Encounter",
  "MedicationRequest",
  "RelatedPerson",
  "DiagnosticReport",
  "Immunization",
  "Coverage",
];

export function draftReference(handle: ResourceHandle): DraftReference {
  return `draft:${handle.group}:${handle.ordinal}`;
}

export function referenceTo(handle: ResourceHandle, display?: string): Reference {
  return display ? { reference: draftReference(handle), display } : { reference: draftReference(handle) };
}

const DRAFT_PATTERN = /^draft:(\d+):(\d+)$/;

export function parseDraftReference(reference: string): { group: number; ordinal: number } | undefined {
  const match = reference.match(DRAFT_PATTERN);
  if (!match) return undefined;
  return { group: Number(match[1]), ordinal: Number(match[2]) };
}

/**
 * Arena for everything one sampled patient produces: the patient itself plus
 * any related persons created from its rules. The assembler never splits a
 * group across bundles.
 */
export class PatientGroup {
  readonly index: number;
  private readonly drafts: DraftResource[] = [];

  constructor(index: number) {
    this.index = index;
  }

  get resources(): readonly DraftResource[] {
    return this.drafts;
  }

  add(resource: FhirResource): ResourceHandle {
    const handle: ResourceHandle = { group: this.index, ordinal: this.drafts.length, resourceType: resource.resourceType };
    this.drafts.push({ handle, resource });
    return handle;
  }

  createRecord(patient: Patient, attributes: Record<string, AttributeValue>, depth: number): PatientRecord {
    return new PatientRecord(this, this.add(patient), patient, attributes, depth);
  }
}

export class PatientRecord {
  readonly group: PatientGroup;
  readonly handle: ResourceHandle;
  readonly patient: Readonly<Patient>;
  readonly depth: number;
  private readonly attrs: Record<string, AttributeValue>;
  private readonly attached: ResourceHandle[];

  constructor(group: PatientGroup, handle: ResourceHandle, patient: Patient, attributes: Record<string, AttributeValue>, depth: number) {
    this.group = group;
    this.handle = handle;
    this.patient = patient;
    this.attrs = { ...attributes };
    this.depth = depth;
    this.attached = [handle];
  }

  get patientIndex(): number {
    return this.group.index;
  }

  get resources(): readonly ResourceHandle[] {
    return this.attached;
  }

  attach(resource: FhirResource): ResourceHandle {
    const handle = this.group.add(resource);
    this.attached.push(handle);
    return handle;
  }

  setAttribute(name: string, value: AttributeValue): void {
    this.attrs[name] = value;
  }

  /** Primitive attributes plus per-type counts (`resources.Condition`, ...). */
  view(): AttributeView {
    const counts: Record<string, number> = {};
    for (const type of RESOURCE_TYPES) counts[`resources.${type}`] = 0;
    for (const h of this.attached) counts[`resources.${h.resourceType}`] += 1;
    return { ...this.attrs, ...counts };
  }
}
