import { ConfigurationError } from "../generator/errors";
import { loadProfile, type Profile } from "../generator/profile";
import diabeticAdult from "./diabetic-adult.json";
import familyCaregiver from "./family-caregiver.json";
import pediatricAsthma from "./pediatric-asthma.json";

const PERSONAS: Readonly<Record<string, unknown>> = {
  "diabetic-adult": diabeticAdult,
  "family-caregiver": familyCaregiver,
  "pediatric-asthma": pediatricAsthma,
};

export function listPersonas(): string[] {
  return Object.keys(PERSONAS).sort();
}

export function loadPersona(name: string): Profile {
  const raw = Object.prototype.hasOwnProperty.call(PERSONAS, name) ? PERSONAS[name] : undefined;
  if (raw === undefined) {
    throw new ConfigurationError(`Unknown persona "${name}" (available: ${listPersonas().join(", ")})`);
  }
  return loadProfile(raw);
}
