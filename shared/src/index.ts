export type Coding = { system?: string; code?: string; display?: string };

export type CodeableConcept = { coding?: Coding[]; text?: string };

export type Reference = { reference?: string; display?: string };

export type Identifier = { system?: string; value?: string; use?: string };

export type HumanName = { family?: string; given?: string[] };

export type ContactPoint = { system: "phone" | "email"; value: string; use?: string };

export type Address = { line?: string[]; city?: string; state?: string; postalCode?: string; country?: string };

export type Period = { start?: string; end?: string };

export type Quantity = { value?: number; unit?: string; system?: string; code?: string };

export type Extension = { url: string; valueReference?: Reference; valueString?: string };

export type Annotation = { text: string };

export type Patient = {
  resourceType: "Patient";
  id?: string;
  identifier?: Identifier[];
  name: HumanName[];
  gender: string;
  birthDate?: string;
  address?: Address[];
  telecom?: ContactPoint[];
};

export type Condition = {
  resourceType: "Condition";
  id?: string;
  clinicalStatus: CodeableConcept;
  verificationStatus: CodeableConcept;
  code: CodeableConcept;
  subject: Reference;
  onsetDateTime: string;
};

export type Observation = {
  resourceType: "Observation";
  id?: string;
  status: string;
  category?: CodeableConcept[];
  code: CodeableConcept;
  subject: Reference;
  effectiveDateTime: string;
  valueQuantity?: Quantity;
  valueBoolean?: boolean;
  valueString?: string;
  valueInteger?: number;
  valueCodeableConcept?: CodeableConcept;
  referenceRange?: Array<{ low?: Quantity; high?: Quantity; text?: string }>;
};

export type Encounter = {
  resourceType: "Encounter";
  id?: string;
  status: string;
  class: Coding;
  type: CodeableConcept[];
  subject: Reference;
  period: Period;
  reasonCode?: CodeableConcept[];
};

export type Dosage = {
  text: string;
  patientInstruction?: string;
  timing: { repeat: { frequency: number; period: number; periodUnit: "d"; boundsPeriod: Period } };
};

export type MedicationRequest = {
  resourceType: "MedicationRequest";
  id?: string;
  status: string;
  intent: string;
  priority?: string;
  medicationCodeableConcept: CodeableConcept;
  subject: Reference;
  authoredOn: string;
  dosageInstruction: Dosage[];
  reasonCode?: CodeableConcept[];
  note?: Annotation[];
  dispenseRequest?: {
    validityPeriod: Period;
    expectedSupplyDuration?: Quantity;
  };
};

export type RelatedPerson = {
  resourceType: "RelatedPerson";
  id?: string;
  active: boolean;
  patient: Reference;
  relationship: CodeableConcept[];
  name: HumanName[];
  gender?: string;
  birthDate?: string;
  identifier?: Identifier[];
  telecom?: ContactPoint[];
  extension: Extension[];
};

export type DiagnosticReport = {
  resourceType: "DiagnosticReport";
  id?: string;
  status: string;
  category: CodeableConcept[];
  code: CodeableConcept;
  subject: Reference;
  effectiveDateTime: string;
  issued: string;
  result?: Reference[];
  conclusion?: string;
};

export type Immunization = {
  resourceType: "Immunization";
  id?: string;
  status: string;
  vaccineCode: CodeableConcept;
  patient: Reference;
  occurrenceDateTime: string;
  protocolApplied?: Array<{ doseNumberPositiveInt: number }>;
  lotNumber?: string;
  site?: CodeableConcept;
  route?: CodeableConcept;
};

export type Coverage = {
  resourceType: "Coverage";
  id?: string;
  status: string;
  type?: CodeableConcept;
  subscriberId?: string;
  beneficiary: Reference;
  payor: Reference[];
  period?: Period;
};

export type FhirResource =
  | Patient
  | Condition
  | Observation
  | Encounter
  | MedicationRequest
  | RelatedPerson
  | DiagnosticReport
  | Immunization
  | Coverage;

export type ResourceType = FhirResource["resourceType"];

export type BundleType = "transaction" | "collection";

export type RequestMethod = "POST" | "PUT";

export type BundleEntry = {
  fullUrl: string;
  resource: FhirResource;
  request?: { method: RequestMethod; url: string; ifNoneExist?: string };
};

export type Bundle = {
  resourceType: "Bundle";
  id: string;
  type: BundleType;
  timestamp: string;
  entry: BundleEntry[];
};

export type GenerateRequest = {
  profile?: unknown;
  persona?: string;
  seed?: number;
  count?: number;
  offset?: number;
  bundleType?: BundleType;
  bundleSize?: number;
  requestMethod?: RequestMethod;
  referenceDate?: string;
};

export type GenerateResponse = {
  seed: number;
  patients: number;
  resources: number;
  bundles: Bundle[];
};

export type ErrorResponse = {
  error: string;
  kind?: "configuration" | "integrity" | "request";
  details?: Record<string, unknown>;
};
