import type { Bundle, BundleType, RequestMethod, ResourceType } from "@cohortgen/shared";
import { type AssemblyGroup, assembleBundles, referencesIn } from "./bundleAssembler";
import { ageOn, parseReferenceDate } from "./dates";
import { sampleDemographics } from "./demographics";
import { ConfigurationError } from "./errors";
import type { Profile } from "./profile";
import { patientStream, randomSeed } from "./random";
import { type AttributeValue, type DraftResource, PatientGroup, parseDraftReference } from "./record";
import { buildPatient, type FactoryContext } from "./resources";
import { applyRules } from "./ruleEngine";

export const DEFAULT_BUNDLE_SIZE = 100;

export type GenerateOptions = {
  seed?: number;
  count?: number;
  offset?: number;
  bundleType?: BundleType;
  bundleSize?: number;
  requestMethod?: RequestMethod;
  referenceDate?: string | Date;
};

export type GenerationResult = {
  seed: number;
  patients: number;
  resources: number;
  bundles: Bundle[];
};

function generateCohortPatient(profile: Profile, seed: number, index: number, referenceDate: Date): PatientGroup {
  const rng = patientStream(seed, index);
  const ctx: FactoryContext = { rng, referenceDate };
  const group = new PatientGroup(index);

  try {
    const demo = sampleDemographics(profile.demographics, rng, referenceDate);
    const patient = buildPatient(
      { name: demo.name, gender: String(demo.attributes.gender), birthDate: demo.birthDate },
      demo.mrn
    );
    applyRules(profile, group.createRecord(patient, demo.attributes, 0), ctx);
  } catch (e) {
    if (e instanceof ConfigurationError) throw e.within({ patientIndex: index });
    throw e;
  }
  return group;
}

function generateSinglePatient(profile: Profile, seed: number, index: number, referenceDate: Date): PatientGroup {
  const def = profile.singlePatient;
  if (!def) throw new ConfigurationError("Profile mode \"single\" requires a single_patient block");

  const rng = patientStream(seed, index);
  const ctx: FactoryContext = { rng, referenceDate };
  const group = new PatientGroup(index);

  const mrn = def.identifiers?.length ? "" : `MRN-${rng.uuid().slice(0, 8)}`;
  const { attributes: extra, ...patientDef } = def;
  const patient = buildPatient(patientDef, mrn);

  const attributes: Record<string, AttributeValue> = { gender: def.gender };
  const age = ageOn(def.birthDate, referenceDate);
  if (age != null) attributes.age = age;
  Object.assign(attributes, extra ?? {});

  applyRules(profile, group.createRecord(patient, attributes, 0), ctx);
  return group;
}

/**
 * Keep the included types, always keep Patients, and pull in anything a kept
 * resource references so filtering never leaves a dangling reference.
 */
export function filterGroup(group: PatientGroup, include: readonly ResourceType[]): AssemblyGroup {
  if (include.length === 0) return { index: group.index, resources: group.resources };

  const wanted = new Set<ResourceType>(["Patient", ...include]);
  const byOrdinal = new Map<number, DraftResource>(group.resources.map((d) => [d.handle.ordinal, d]));
  const kept = new Set<number>();
  const queue = group.resources.filter((d) => wanted.has(d.handle.resourceType));

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next || kept.has(next.handle.ordinal)) continue;
    kept.add(next.handle.ordinal);
    for (const ref of referencesIn(next.resource)) {
      const draft = parseDraftReference(ref);
      const target = draft && draft.group === group.index ? byOrdinal.get(draft.ordinal) : undefined;
      if (target && !kept.has(target.handle.ordinal)) queue.push(target);
    }
  }

  return { index: group.index, resources: group.resources.filter((d) => kept.has(d.handle.ordinal)) };
}

/**
 * Run a profile. Every patient is generated before anything is assembled, so
 * an error anywhere leaves no partial output behind.
 */
export function generate(profile: Profile, options: GenerateOptions = {}): GenerationResult {
  const seed = options.seed ?? randomSeed();
  const referenceDate =
    options.referenceDate instanceof Date ? options.referenceDate : parseReferenceDate(options.referenceDate);
  const offset = options.offset ?? 0;
  const count = profile.mode === "single" ? 1 : options.count ?? 1;

  if (!Number.isInteger(count) || count < 0) throw new ConfigurationError(`Patient count must be a non-negative integer, got ${count}`);
  if (!Number.isInteger(offset) || offset < 0) throw new ConfigurationError(`Patient offset must be a non-negative integer, got ${offset}`);

  const groups: PatientGroup[] = [];
  for (let i = offset; i < offset + count; i++) {
    groups.push(
      profile.mode === "single"
        ? generateSinglePatient(profile, seed, i, referenceDate)
        : generateCohortPatient(profile, seed, i, referenceDate)
    );
  }

  const assembly = groups.map((g) => filterGroup(g, profile.include));
  const bundleSize = options.bundleSize ?? profile.output.bundleSize ?? DEFAULT_BUNDLE_SIZE;
  if (!Number.isInteger(bundleSize) || bundleSize < 1) throw new ConfigurationError(`Bundle size must be a positive integer, got ${bundleSize}`);

  const bundles = assembleBundles(assembly, {
    seed,
    bundleType: options.bundleType ?? profile.output.mode,
    bundleSize,
    requestMethod: options.requestMethod ?? profile.output.requestMethod,
    referenceDate,
  });

  return {
    seed,
    patients: groups.length,
    resources: assembly.reduce((n, g) => n + g.resources.length, 0),
    bundles,
  };
}
