import { z } from "zod";
import type { ResourceType } from "@cohortgen/shared";
import { compileCondition, conditionAttributes, type ConditionExpr } from "./conditions";
import { validateDemographics } from "./demographics";
import { ConfigurationError } from "./errors";
import { RESOURCE_TYPES, type AttributeValue } from "./record";
import { relationshipFor, type RelationshipKeyword } from "./relationships";

/** ===== Shared fragments ===== */
const CodeDef = z.object({
  system: z.string().optional(),
  value: z.string().optional(),
  code: z.string().optional(),
  display: z.string().optional(),
}).strict();
export type CodeDef = z.infer<typeof CodeDef>;

const AttributeValueSchema = z.union([z.number(), z.string(), z.boolean()]);

const NameDef = z.object({
  family: z.string().optional(),
  given: z.array(z.string()).optional(),
}).strict();

const IdentifierDef = z.object({
  system: z.string().optional(),
  value: z.string(),
  use: z.string().optional(),
}).strict();

const TelecomDef = z.object({
  system: z.enum(["phone", "email"]),
  value: z.string(),
  use: z.string().optional(),
}).strict();

const AddressDef = z.object({
  line: z.array(z.string()).optional(),
  city: z.string().optional(),
  state: z.string().optional(),
  postalCode: z.string().optional(),
  country: z.string().optional(),
}).strict();

/** ===== Demographics ===== */
const NumericDistribution = z.object({
  min: z.number(),
  max: z.number(),
  shape: z.enum(["uniform", "normal"]).default("uniform"),
  integer: z.boolean().optional(),
});
export type NumericDistribution = z.infer<typeof NumericDistribution>;

const CategoricalDistribution = z.object({
  distribution: z.record(z.string(), z.number()),
});
export type CategoricalDistribution = z.infer<typeof CategoricalDistribution>;

const Distribution = z.union([NumericDistribution, CategoricalDistribution]);
export type Distribution = z.infer<typeof Distribution>;
export type DemographicsSpec = Record<string, Distribution>;

const PatientDef = z.object({
  name: NameDef.default({}),
  gender: z.string().default("unknown"),
  birthDate: z.string().optional(),
  identifiers: z.array(IdentifierDef).optional(),
  address: AddressDef.optional(),
  telecom: z.array(TelecomDef).optional(),
  phone: z.string().optional(),
  email: z.string().optional(),
  attributes: z.record(z.string(), AttributeValueSchema).optional(),
}).strict();
export type PatientDef = z.infer<typeof PatientDef>;

/** ===== Effect definitions ===== */
const ConditionDef = z.object({
  code: CodeDef,
  onset: z.object({ years_ago: z.number().optional(), days_ago: z.number().optional() }).strict().optional(),
  clinical_status: z.string().optional(),
  verification_status: z.string().optional(),
}).strict();
export type ConditionDef = z.infer<typeof ConditionDef>;

const TimesDef = z.object({
  qty: z.number().int().min(1).optional(),
  days_ago: z.number().optional(),
  spacing_days: z.number().optional(),
  lookback_months: z.number().optional(),
  lookback_days: z.number().optional(),
}).strict();
export type TimesDef = z.infer<typeof TimesDef>;

const ObservationDef = z.object({
  loinc: z.string(),
  display: z.string().optional(),
  unit: z.string().optional(),
  range: z.object({ min: z.number(), max: z.number() }).strict().optional(),
  value: z.union([z.number(), z.string(), z.boolean(), CodeDef]).optional(),
  value_type: z.enum(["quantity", "boolean", "string", "integer", "coded"]).default("quantity"),
  status: z.string().optional(),
  category: z.string().optional(),
  reference_range: z
    .object({ low: z.number().optional(), high: z.number().optional(), text: z.string().optional() })
    .strict()
    .optional(),
  times: TimesDef.optional(),
}).strict();
export type ObservationDef = z.infer<typeof ObservationDef>;

const EncounterDef = z.object({
  class: z.string().optional(),
  type: CodeDef.optional(),
  status: z.string().optional(),
  days_ago: z.number().optional(),
  duration_hours: z.number().optional(),
  reason: z.union([z.string(), CodeDef]).optional(),
  qty: z.number().int().min(1).default(1),
  spread_months: z.number().min(0).default(12),
}).strict();
export type EncounterDef = z.infer<typeof EncounterDef>;

const MedicationDef = z.object({
  rxnorm: z.string(),
  display: z.string().optional(),
  sig: z.string().optional(),
  frequency: z.number().optional(),
  status: z.string().optional(),
  intent: z.string().optional(),
  priority: z.string().optional(),
  duration_days: z.number().optional(),
  start_days_ago: z.number().optional(),
  completed_days_ago: z.number().optional(),
  instructions: z.string().optional(),
  reason: z.union([z.string(), CodeDef]).optional(),
  notes: z.union([z.string(), z.array(z.string())]).optional(),
}).strict();
export type MedicationDef = z.infer<typeof MedicationDef>;

const RelatedPersonDef = z.object({
  name: NameDef,
  relationship: z.string(),
  gender: z.string().optional(),
  birthDate: z.string().optional(),
  identifiers: z.array(IdentifierDef).optional(),
  contact: z.object({ phone: z.string().optional(), email: z.string().optional() }).strict().optional(),
  phone: z.string().optional(),
  email: z.string().optional(),
  active: z.boolean().default(true),
  attributes: z.record(z.string(), AttributeValueSchema).optional(),
  apply_rules: z.boolean().optional(),
}).strict();
export type RelatedPersonDef = z.infer<typeof RelatedPersonDef>;

const DiagnosticReportDef = z.object({
  code: CodeDef,
  category: CodeDef.optional(),
  status: z.string().optional(),
  days_ago: z.number().optional(),
  conclusion: z.string().optional(),
  observations: z.array(ObservationDef).default([]),
}).strict();
export type DiagnosticReportDef = z.infer<typeof DiagnosticReportDef>;

const ImmunizationDef = z.object({
  vaccine: CodeDef,
  status: z.string().optional(),
  days_ago: z.number().optional(),
  qty: z.number().int().min(1).default(1),
  lot_number: z.string().optional(),
  site: z.string().optional(),
  route: z.string().optional(),
}).strict();
export type ImmunizationDef = z.infer<typeof ImmunizationDef>;

const CoverageDef = z.object({
  payor: z.string(),
  type: CodeDef.optional(),
  status: z.string().optional(),
  subscriber_id: z.string().optional(),
  start_days_ago: z.number().optional(),
  duration_days: z.number().optional(),
}).strict();
export type CoverageDef = z.infer<typeof CoverageDef>;

/** ===== Rules & profile ===== */
const RuleDef = z.object({
  name: z.string().min(1),
  when: z.object({ condition: z.string().default("true") }).strict().default({}),
  then: z
    .object({
      add_conditions: z.array(ConditionDef).default([]),
      add_observations: z.array(ObservationDef).default([]),
      add_encounters: z.array(EncounterDef).default([]),
      encounters: z.array(EncounterDef).default([]),
      add_medication_requests: z.array(MedicationDef).default([]),
      meds: z.array(MedicationDef).default([]),
      related_persons: z.array(RelatedPersonDef).default([]),
      add_diagnostic_reports: z.array(DiagnosticReportDef).default([]),
      diagnostic_reports: z.array(DiagnosticReportDef).default([]),
      add_immunizations: z.array(ImmunizationDef).default([]),
      immunizations: z.array(ImmunizationDef).default([]),
      add_coverage: z.array(CoverageDef).default([]),
      coverage: z.array(CoverageDef).default([]),
      set_attributes: z.record(z.string(), AttributeValueSchema).default({}),
    })
    .strict()
    .default({}),
}).strict();
type RuleDef = z.infer<typeof RuleDef>;

const ResourceTypeSchema = z.enum([
  "Patient",
  "Condition",
  "Observation",
  "Encounter",
  "MedicationRequest",
  "RelatedPerson",
  "DiagnosticReport",
  "Immunization",
  "Coverage",
]);

export const ProfileSchema = z.object({
  version: z.string().default("0.1"),
  mode: z.enum(["single", "cohort"]).default("cohort"),
  demographics: z.record(z.string(), Distribution).default({}),
  single_patient: PatientDef.optional(),
  resources: z
    .object({
      include: z.array(ResourceTypeSchema).default([]),
      rules: z.array(RuleDef).default([]),
      apply_rules_to_related: z.boolean().default(false),
      max_related_depth: z.number().int().min(0).default(1),
    })
    .strict()
    .default({}),
  output: z
    .object({
      mode: z.enum(["transaction", "collection"]).default("transaction"),
      bundle_size: z.number().int().positive().optional(),
      request_method: z.enum(["POST", "PUT"]).default("POST"),
    })
    .strict()
    .default({}),
});
export type ProfileInput = z.input<typeof ProfileSchema>;

export type Effect =
  | { kind: "AddCondition"; def: ConditionDef }
  | { kind: "AddObservation"; def: ObservationDef }
  | { kind: "AddEncounter"; def: EncounterDef }
  | { kind: "AddMedicationRequest"; def: MedicationDef }
  | { kind: "AddRelatedPerson"; def: RelatedPersonDef; relationship: RelationshipKeyword }
  | { kind: "AddDiagnosticReport"; def: DiagnosticReportDef }
  | { kind: "AddImmunization"; def: ImmunizationDef }
  | { kind: "AddCoverage"; def: CoverageDef }
  | { kind: "SetAttributes"; values: Record<string, AttributeValue> };

export type Rule = {
  name: string;
  condition: ConditionExpr;
  effects: Effect[];
};

export type Profile = {
  version: string;
  mode: "single" | "cohort";
  demographics: DemographicsSpec;
  singlePatient?: PatientDef;
  include: ResourceType[];
  rules: Rule[];
  applyRulesToRelated: boolean;
  maxRelatedDepth: number;
  output: {
    mode: "transaction" | "collection";
    bundleSize?: number;
    requestMethod: "POST" | "PUT";
  };
};

function issuePath(path: Array<string | number>): string {
  return path.length ? path.join(".") : "(root)";
}

type ThenBlock = RuleDef["then"];
type EffectKey = keyof ThenBlock;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isEffectKey(then: ThenBlock, key: string): key is EffectKey {
  return Object.prototype.hasOwnProperty.call(then, key);
}

/** Keys of a rule's `then` block as written; parsing reorders them. */
function declaredEffectKeys(input: unknown, ruleIndex: number): string[] {
  const resources = isRecord(input) ? input.resources : undefined;
  const rules = isRecord(resources) ? resources.rules : undefined;
  const rule: unknown = Array.isArray(rules) ? rules[ruleIndex] : undefined;
  const then = isRecord(rule) ? rule.then : undefined;
  return isRecord(then) ? Object.keys(then) : [];
}

function compileEffect(then: ThenBlock, key: EffectKey, rule: string): Effect[] {
  switch (key) {
    case "add_conditions":
      return then[key].map((def): Effect => ({ kind: "AddCondition", def }));
    case "add_observations":
      return then[key].map((def): Effect => ({ kind: "AddObservation", def }));
    case "add_encounters":
    case "encounters":
      return then[key].map((def): Effect => ({ kind: "AddEncounter", def }));
    case "add_medication_requests":
    case "meds":
      return then[key].map((def): Effect => ({ kind: "AddMedicationRequest", def }));
    case "related_persons":
      return then[key].map((def): Effect => {
        try {
          return { kind: "AddRelatedPerson", def, relationship: relationshipFor(def.relationship).relationship };
        } catch (e) {
          if (e instanceof ConfigurationError) throw e.within({ rule, effect: "AddRelatedPerson" });
          throw e;
        }
      });
    case "add_diagnostic_reports":
    case "diagnostic_reports":
      return then[key].map((def): Effect => ({ kind: "AddDiagnosticReport", def }));
    case "add_immunizations":
    case "immunizations":
      return then[key].map((def): Effect => ({ kind: "AddImmunization", def }));
    case "add_coverage":
    case "coverage":
      return then[key].map((def): Effect => ({ kind: "AddCoverage", def }));
    case "set_attributes":
      return Object.keys(then.set_attributes).length > 0 ? [{ kind: "SetAttributes", values: { ...then.set_attributes } }] : [];
  }
}

/** Effects in the order their keys appear in the rule's `then` block. */
function compileEffects(then: ThenBlock, order: readonly string[], rule: string): Effect[] {
  const effects: Effect[] = [];
  for (const key of order) {
    if (isEffectKey(then, key)) effects.push(...compileEffect(then, key, rule));
  }
  return effects;
}

/**
 * Validate an already-parsed profile object and compile its rules: condition
 * strings become expression trees, effect blocks become tagged variants.
 * Everything that can be checked before generation fails here.
 */
export function loadProfile(input: unknown): Profile {
  const parsed = ProfileSchema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const detail = parsed.error.issues.map((i) => `${issuePath(i.path)}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid profile: ${detail}`, { path: first ? issuePath(first.path) : undefined });
  }
  const raw = parsed.data;

  if (raw.mode === "single" && !raw.single_patient) {
    throw new ConfigurationError("Profile mode \"single\" requires a single_patient block");
  }
  validateDemographics(raw.demographics);

  const declared = new Set<string>(RESOURCE_TYPES.map((t) => `resources.${t}`));
  if (raw.mode === "single" && raw.single_patient) {
    declared.add("gender");
    if (raw.single_patient.birthDate) declared.add("age");
    for (const key of Object.keys(raw.single_patient.attributes ?? {})) declared.add(key);
  } else {
    declared.add("age");
    declared.add("gender");
    for (const key of Object.keys(raw.demographics)) declared.add(key);
  }

  const rules: Rule[] = raw.resources.rules.map((rule, index) => {
    let condition: ConditionExpr;
    try {
      condition = compileCondition(rule.when.condition);
    } catch (e) {
      if (e instanceof ConfigurationError) throw e.within({ rule: rule.name });
      throw e;
    }
    for (const attribute of conditionAttributes(condition)) {
      if (!declared.has(attribute)) {
        throw new ConfigurationError(`Condition references undeclared attribute "${attribute}"`, { rule: rule.name });
      }
    }
    const effects = compileEffects(rule.then, declaredEffectKeys(input, index), rule.name);
    for (const key of Object.keys(rule.then.set_attributes)) declared.add(key);
    return { name: rule.name, condition, effects };
  });

  return {
    version: raw.version,
    mode: raw.mode,
    demographics: raw.demographics,
    singlePatient: raw.single_patient,
    include: raw.resources.include,
    rules,
    applyRulesToRelated: raw.resources.apply_rules_to_related,
    maxRelatedDepth: raw.resources.max_related_depth,
    output: {
      mode: raw.output.mode,
      bundleSize: raw.output.bundle_size,
      requestMethod: raw.output.request_method,
    },
  };
}
