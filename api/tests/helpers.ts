import type { Bundle, FhirResource, ResourceType } from "@cohortgen/shared";

export const REFERENCE_DATE = "2025-06-01";

export type ResourceOf<T extends ResourceType> = Extract<FhirResource, { resourceType: T }>;

export function resourcesOf<T extends ResourceType>(bundle: Bundle, type: T): ResourceOf<T>[] {
  return bundle.entry.map((e) => e.resource).filter((r): r is ResourceOf<T> => r.resourceType === type);
}

export function typesIn(bundle: Bundle): ResourceType[] {
  return bundle.entry.map((e) => e.resource.resourceType);
}
