import names from "../data/names.json";
import { daysBefore, isoDate, yearsBefore } from "./dates";
import { ConfigurationError } from "./errors";
import type { CategoricalDistribution, DemographicsSpec, Distribution, NumericDistribution } from "./profile";
import type { Rng } from "./random";
import type { AttributeValue } from "./record";

export type SampledDemographics = {
  attributes: Record<string, AttributeValue>;
  name: { given: string[]; family: string };
  birthDate: string;
  mrn: string;
};

const DEFAULT_AGE: NumericDistribution = { min: 18, max: 90, shape: "uniform" };
const DEFAULT_GENDER: CategoricalDistribution = { distribution: { male: 1, female: 1 } };

function isCategorical(dist: Distribution): dist is CategoricalDistribution {
  return "distribution" in dist;
}

function checkDistribution(attribute: string, dist: Distribution): void {
  if (isCategorical(dist)) {
    const weights = Object.entries(dist.distribution);
    for (const [label, w] of weights) {
      if (!Number.isFinite(w) || w < 0) {
        throw new ConfigurationError(`Weight for "${label}" must be a non-negative number`, { path: `demographics.${attribute}` });
      }
    }
    if (!weights.some(([, w]) => w > 0)) {
      throw new ConfigurationError(`Categorical weights for "${attribute}" are all zero`, { path: `demographics.${attribute}` });
    }
    return;
  }
  if (dist.min > dist.max) {
    throw new ConfigurationError(`Range for "${attribute}" has min ${dist.min} > max ${dist.max}`, { path: `demographics.${attribute}` });
  }
  const integer = attribute === "age" || dist.integer === true;
  if (integer && Math.ceil(dist.min) > Math.floor(dist.max)) {
    throw new ConfigurationError(`Range for "${attribute}" contains no whole number (${dist.min} to ${dist.max})`, {
      path: `demographics.${attribute}`,
    });
  }
}

export function validateDemographics(spec: DemographicsSpec): void {
  for (const [attribute, dist] of Object.entries(spec)) checkDistribution(attribute, dist);
}

function sampleNumeric(dist: NumericDistribution, rng: Rng, integer: boolean): number {
  let value: number;
  if (dist.shape === "normal") {
    const mean = (dist.min + dist.max) / 2;
    const sd = (dist.max - dist.min) / 6;
    value = Math.min(dist.max, Math.max(dist.min, rng.normal(mean, sd)));
  } else {
    value = integer ? rng.int(dist.min, dist.max) : rng.uniform(dist.min, dist.max);
  }
  if (integer) return Math.min(Math.floor(dist.max), Math.max(Math.ceil(dist.min), Math.round(value)));
  return Math.round(value * 100) / 100;
}

function sampleAttribute(attribute: string, dist: Distribution, rng: Rng, integer: boolean): AttributeValue {
  checkDistribution(attribute, dist);
  if (isCategorical(dist)) return rng.weighted(dist.distribution);
  return sampleNumeric(dist, rng, integer);
}

/**
 * Draw one patient's attributes. The order of draws is fixed (age, gender,
 * remaining attributes in declaration order, birth day, names, MRN) so a given
 * substream always yields the same patient.
 */
export function sampleDemographics(spec: DemographicsSpec, rng: Rng, referenceDate: Date): SampledDemographics {
  const ageDist = spec.age ?? DEFAULT_AGE;
  if (isCategorical(ageDist)) {
    throw new ConfigurationError("Attribute \"age\" must be a numeric range", { path: "demographics.age" });
  }
  const age = Number(sampleAttribute("age", ageDist, rng, true));
  const gender = String(sampleAttribute("gender", spec.gender ?? DEFAULT_GENDER, rng, false));

  const attributes: Record<string, AttributeValue> = { age, gender };
  for (const [attribute, dist] of Object.entries(spec)) {
    if (attribute === "age" || attribute === "gender") continue;
    const integer = !isCategorical(dist) && dist.integer === true;
    attributes[attribute] = sampleAttribute(attribute, dist, rng, integer);
  }

  const birthDate = isoDate(daysBefore(yearsBefore(referenceDate, age), rng.int(0, 364)));
  const given = [rng.pick(gender === "female" ? names.female : names.male)];
  const family = rng.pick(names.family);
  const mrn = `MRN-${rng.uuid().slice(0, 8)}`;

  return { attributes, name: { given, family }, birthDate, mrn };
}
