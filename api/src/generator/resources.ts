import type {
  CodeableConcept,
  Condition,
  ContactPoint,
  Coverage,
  DiagnosticReport,
  Encounter,
  HumanName,
  Identifier,
  Immunization,
  MedicationRequest,
  Observation,
  Patient,
  Reference,
  RelatedPerson,
} from "@cohortgen/shared";
import { daysAfter, daysBefore, hoursAfter, isoDate, isoDateTime } from "./dates";
import type {
  CodeDef,
  ConditionDef,
  CoverageDef,
  DiagnosticReportDef,
  EncounterDef,
  ImmunizationDef,
  MedicationDef,
  ObservationDef,
  PatientDef,
  TimesDef,
} from "./profile";
import type { Rng } from "./random";

export const SYSTEMS = {
  MRN: "http://hospital.example/mrn",
  SNOMED: "http://snomed.info/sct",
  LOINC: "http://loinc.org",
  RXNORM: "http://www.nlm.nih.gov/research/umls/rxnorm",
  CVX: "http://hl7.org/fhir/sid/cvx",
  UCUM: "http://unitsofmeasure.org",
  CONDITION_CLINICAL: "http://terminology.hl7.org/CodeSystem/condition-clinical",
  CONDITION_VER_STATUS: "http://terminology.hl7.org/CodeSystem/condition-ver-status",
  OBSERVATION_CATEGORY: "http://terminology.hl7.org/CodeSystem/observation-category",
  V3_ACTCODE: "http://terminology.hl7.org/CodeSystem/v3-ActCode",
  V3_ROLECODE: "http://terminology.hl7.org/CodeSystem/v3-RoleCode",
  V3_ACTSITE: "http://terminology.hl7.org/CodeSystem/v3-ActSite",
  V3_ROUTE: "http://terminology.hl7.org/CodeSystem/v3-RouteOfAdministration",
  V2_0074: "http://terminology.hl7.org/CodeSystem/v2-0074",
  COVERAGE_TYPE: "http://terminology.hl7.org/CodeSystem/v3-ActCode",
  RELATED_PATIENT_EXTENSION: "http://cohortgen.example/fhir/StructureDefinition/related-patient",
} as const;

const DEFAULT_ADDRESS = { line: ["123 Main Street"], city: "Boston", state: "MA", postalCode: "02134", country: "US" };

const DEFAULT_TELECOM: ContactPoint[] = [
  { system: "phone", value: "555-1234", use: "home" },
  { system: "email", value: "patient@example.com", use: "home" },
];

export type FactoryContext = {
  rng: Rng;
  referenceDate: Date;
};

function concept(def: CodeDef, fallbackSystem: string): CodeableConcept {
  return {
    coding: [{ system: def.system ?? fallbackSystem, code: def.value ?? def.code, display: def.display }],
  };
}

function textOrConcept(reason: string | CodeDef, fallbackSystem: string): CodeableConcept {
  return typeof reason === "string" ? { text: reason } : concept(reason, fallbackSystem);
}

function humanName(name: { family?: string; given?: string[] } | undefined): HumanName {
  return { family: name?.family ?? "Doe", given: name?.given ?? ["John"] };
}

function contactPoints(phone: string | undefined, email: string | undefined): ContactPoint[] {
  const out: ContactPoint[] = [];
  if (phone) out.push({ system: "phone", value: phone, use: "home" });
  if (email) out.push({ system: "email", value: email, use: "home" });
  return out;
}

/** `mrn` is used only when the definition carries no identifiers of its own. */
export function buildPatient(def: Omit<PatientDef, "attributes">, mrn: string): Patient {
  const identifier: Identifier[] = (def.identifiers ?? []).map((i) => ({ system: i.system, value: i.value }));
  if (identifier.length === 0) identifier.push({ system: SYSTEMS.MRN, value: mrn });

  const address = def.address
    ? [{ ...def.address, country: def.address.country ?? "US" }]
    : [DEFAULT_ADDRESS];

  const telecom: ContactPoint[] = [
    ...(def.telecom ?? []).map((t) => ({ ...t })),
    ...contactPoints(def.phone, def.email),
  ];

  const patient: Patient = {
    resourceType: "Patient",
    identifier,
    name: [humanName(def.name)],
    gender: def.gender,
    address,
    telecom: telecom.length > 0 ? telecom : DEFAULT_TELECOM.map((t) => ({ ...t })),
  };
  if (def.birthDate) patient.birthDate = def.birthDate;
  return patient;
}

export function buildCondition(def: ConditionDef, subject: Reference, ctx: FactoryContext): Condition {
  const onsetDays =
    def.onset?.years_ago != null ? def.onset.years_ago * 365 : def.onset?.days_ago != null ? def.onset.days_ago : 365;
  return {
    resourceType: "Condition",
    clinicalStatus: { coding: [{ system: SYSTEMS.CONDITION_CLINICAL, code: def.clinical_status ?? "active" }] },
    verificationStatus: { coding: [{ system: SYSTEMS.CONDITION_VER_STATUS, code: def.verification_status ?? "confirmed" }] },
    code: concept(def.code, SYSTEMS.SNOMED),
    subject,
    onsetDateTime: isoDate(daysBefore(ctx.referenceDate, onsetDays)),
  };
}

/** Occurrence times for repeated observations. */
export function timePoints(times: TimesDef | undefined, ctx: FactoryContext): Date[] {
  const { rng, referenceDate } = ctx;
  const qty = Math.max(times?.qty ?? 1, 1);
  let offsets: number[];

  if (times?.days_ago != null) {
    const base = times.days_ago;
    const spacing = times.spacing_days ?? Math.max(Math.floor(base / Math.max(qty - 1, 1)), 1);
    offsets = qty === 1 ? [base] : Array.from({ length: qty }, (_, i) => base + i * spacing);
  } else if (times?.lookback_months != null) {
    const total = Math.floor(times.lookback_months * 30);
    if (qty === 1) {
      offsets = [rng.int(0, Math.max(total, 1))];
    } else {
      const step = total / Math.max(qty - 1, 1);
      offsets = Array.from({ length: qty }, (_, i) => Math.round(i * step));
    }
  } else if (times?.lookback_days != null) {
    const total = Math.floor(times.lookback_days);
    offsets = Array.from({ length: qty }, () => rng.int(0, Math.max(total, 1))).sort((a, b) => a - b);
  } else {
    offsets = Array.from({ length: qty }, () => rng.int(1, 30));
  }

  return offsets.map((days) => daysBefore(referenceDate, days));
}

export function buildObservation(def: ObservationDef, subject: Reference, when: Date, ctx: FactoryContext): Observation {
  const { rng } = ctx;
  const obs: Observation = {
    resourceType: "Observation",
    status: def.status ?? "final",
    code: { coding: [{ system: SYSTEMS.LOINC, code: def.loinc, display: def.display ?? "" }] },
    subject,
    effectiveDateTime: isoDateTime(when),
  };
  if (def.category) {
    obs.category = [{ coding: [{ system: SYSTEMS.OBSERVATION_CATEGORY, code: def.category }] }];
  }

  const min = def.range?.min ?? 0;
  const max = def.range?.max ?? 100;
  const unit = def.unit || "1";

  switch (def.value_type) {
    case "boolean":
      obs.valueBoolean = typeof def.value === "boolean" ? def.value : true;
      break;
    case "string":
      obs.valueString = typeof def.value === "string" ? def.value : def.display ?? "";
      break;
    case "integer":
      obs.valueInteger = typeof def.value === "number" ? Math.round(def.value) : rng.int(min, max);
      break;
    case "coded":
      if (def.value != null && typeof def.value === "object") obs.valueCodeableConcept = concept(def.value, SYSTEMS.LOINC);
      else obs.valueString = String(def.value ?? "");
      break;
    case "quantity": {
      const value = typeof def.value === "number" ? def.value : Math.round(rng.uniform(min, max) * 100) / 100;
      obs.valueQuantity = { value, unit, system: SYSTEMS.UCUM, code: unit };
      break;
    }
  }

  if (def.reference_range) {
    const { low, high, text } = def.reference_range;
    obs.referenceRange = [
      {
        ...(low != null ? { low: { value: low, unit, system: SYSTEMS.UCUM, code: unit } } : {}),
        ...(high != null ? { high: { value: high, unit, system: SYSTEMS.UCUM, code: unit } } : {}),
        ...(text ? { text } : {}),
      },
    ];
  }
  return obs;
}

export function buildEncounter(def: EncounterDef, subject: Reference, daysAgo: number, ctx: FactoryContext): Encounter {
  const start = daysBefore(ctx.referenceDate, daysAgo);
  const end = hoursAfter(start, def.duration_hours ?? 1);
  const encounter: Encounter = {
    resourceType: "Encounter",
    status: def.status ?? "finished",
    class: { system: SYSTEMS.V3_ACTCODE, code: def.class ?? "AMB", display: def.class ? undefined : "ambulatory" },
    type: [
      def.type
        ? concept(def.type, SYSTEMS.SNOMED)
        : { coding: [{ system: SYSTEMS.SNOMED, code: "162673000", display: "General examination" }] },
    ],
    subject,
    period: { start: isoDateTime(start), end: isoDateTime(end) },
  };
  if (def.reason) encounter.reasonCode = [textOrConcept(def.reason, SYSTEMS.SNOMED)];
  return encounter;
}

export function buildMedicationRequest(def: MedicationDef, subject: Reference, ctx: FactoryContext): MedicationRequest {
  const ref = ctx.referenceDate;
  const frequency = Math.max(1, Math.floor(def.frequency ?? 1));

  let start = ref;
  if (def.start_days_ago != null) start = daysBefore(ref, def.start_days_ago);
  else if (def.completed_days_ago != null && def.duration_days != null) {
    start = daysBefore(ref, def.completed_days_ago + def.duration_days);
  }

  let end: Date | undefined;
  if (def.completed_days_ago != null) end = daysBefore(ref, def.completed_days_ago);
  else if (def.duration_days != null) end = daysAfter(start, def.duration_days);

  const boundsPeriod = end ? { start: isoDateTime(start), end: isoDateTime(end) } : { start: isoDateTime(start) };
  const status = def.status ?? (def.completed_days_ago != null ? "completed" : "active");

  const request: MedicationRequest = {
    resourceType: "MedicationRequest",
    status,
    intent: def.intent ?? "order",
    medicationCodeableConcept: { coding: [{ system: SYSTEMS.RXNORM, code: def.rxnorm, display: def.display ?? "" }] },
    subject,
    authoredOn: isoDateTime(start),
    dosageInstruction: [
      {
        text: def.sig ?? "Take as directed",
        ...(def.instructions ? { patientInstruction: def.instructions } : {}),
        timing: { repeat: { frequency, period: 1, periodUnit: "d", boundsPeriod } },
      },
    ],
    dispenseRequest: {
      validityPeriod: boundsPeriod,
      ...(def.duration_days != null
        ? { expectedSupplyDuration: { value: def.duration_days, unit: "day", system: SYSTEMS.UCUM, code: "d" } }
        : {}),
    },
  };
  if (def.priority) request.priority = def.priority;
  if (def.reason) request.reasonCode = [textOrConcept(def.reason, SYSTEMS.SNOMED)];
  if (def.notes) {
    const notes = Array.isArray(def.notes) ? def.notes : [def.notes];
    request.note = notes.map((text) => ({ text }));
  }
  return request;
}

export type RelatedPersonFields = {
  name?: { family?: string; given?: string[] };
  relationship: { code: string; display: string; keyword: string };
  gender?: string;
  birthDate?: string;
  identifiers?: Identifier[];
  phone?: string;
  email?: string;
  active?: boolean;
};

/**
 * `patient` is the record this resource is attached to; `relatedPatient` is
 * the Patient resource of the person it describes.
 */
export function buildRelatedPerson(fields: RelatedPersonFields, patient: Reference, relatedPatient: Reference): RelatedPerson {
  const related: RelatedPerson = {
    resourceType: "RelatedPerson",
    active: fields.active ?? true,
    patient,
    relationship: [
      {
        coding: [{ system: SYSTEMS.V3_ROLECODE, code: fields.relationship.code, display: fields.relationship.display }],
        text: fields.relationship.keyword,
      },
    ],
    name: [humanName(fields.name)],
    extension: [{ url: SYSTEMS.RELATED_PATIENT_EXTENSION, valueReference: relatedPatient }],
  };
  if (fields.gender) related.gender = fields.gender;
  if (fields.birthDate) related.birthDate = fields.birthDate;
  if (fields.identifiers?.length) {
    related.identifier = fields.identifiers.map((i) => ({ system: i.system, value: i.value, use: i.use ?? "official" }));
  }
  const telecom = contactPoints(fields.phone, fields.email);
  if (telecom.length) related.telecom = telecom;
  return related;
}

export function buildDiagnosticReport(
  def: DiagnosticReportDef,
  subject: Reference,
  results: Reference[],
  ctx: FactoryContext
): DiagnosticReport {
  const issued = isoDateTime(daysBefore(ctx.referenceDate, def.days_ago ?? ctx.rng.int(1, 30)));
  const report: DiagnosticReport = {
    resourceType: "DiagnosticReport",
    status: def.status ?? "final",
    category: [
      def.category
        ? concept(def.category, SYSTEMS.V2_0074)
        : { coding: [{ system: SYSTEMS.V2_0074, code: "LAB", display: "Laboratory" }] },
    ],
    code: concept(def.code, SYSTEMS.LOINC),
    subject,
    effectiveDateTime: issued,
    issued,
  };
  if (results.length) report.result = results;
  if (def.conclusion) report.conclusion = def.conclusion;
  return report;
}

export function buildImmunization(def: ImmunizationDef, subject: Reference, dose: number, ctx: FactoryContext): Immunization {
  const daysAgo =
    def.days_ago != null ? (def.qty > 1 ? def.days_ago - (dose - 1) * 30 : def.days_ago) : ctx.rng.int(30, 365);
  const immunization: Immunization = {
    resourceType: "Immunization",
    status: def.status ?? "completed",
    vaccineCode: concept(def.vaccine, SYSTEMS.CVX),
    patient: subject,
    occurrenceDateTime: isoDateTime(daysBefore(ctx.referenceDate, daysAgo)),
  };
  if (def.qty > 1) immunization.protocolApplied = [{ doseNumberPositiveInt: dose }];
  if (def.lot_number) immunization.lotNumber = def.lot_number;
  if (def.site) immunization.site = { coding: [{ system: SYSTEMS.V3_ACTSITE, code: def.site }] };
  if (def.route) immunization.route = { coding: [{ system: SYSTEMS.V3_ROUTE, code: def.route }] };
  return immunization;
}

export function buildCoverage(def: CoverageDef, beneficiary: Reference, ctx: FactoryContext): Coverage {
  const coverage: Coverage = {
    resourceType: "Coverage",
    status: def.status ?? "active",
    beneficiary,
    payor: [{ display: def.payor }],
  };
  if (def.type) coverage.type = concept(def.type, SYSTEMS.COVERAGE_TYPE);
  if (def.subscriber_id) coverage.subscriberId = def.subscriber_id;
  if (def.start_days_ago != null) {
    const start = daysBefore(ctx.referenceDate, def.start_days_ago);
    coverage.period = def.duration_days != null
      ? { start: isoDate(start), end: isoDate(daysAfter(start, def.duration_days)) }
      : { start: isoDate(start) };
  }
  return coverage;
}
