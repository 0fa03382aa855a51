import type { Bundle, BundleEntry, BundleType, FhirResource, RequestMethod } from "@cohortgen/shared";
import { isoDateTime } from "./dates";
import { IntegrityError } from "./errors";
import { deriveSeed, makeRng } from "./random";
import { type DraftResource, parseDraftReference } from "./record";

export type AssemblyGroup = {
  index: number;
  resources: readonly DraftResource[];
};

export type AssembleOptions = {
  seed: number;
  bundleType: BundleType;
  bundleSize: number;
  requestMethod: RequestMethod;
  referenceDate: Date;
};

type Assigned = { id: string; resourceType: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Visit every `reference` string inside a resource. */
function walkReferences(node: unknown, visit: (reference: string) => void): void {
  const seen = new Set<unknown>();

  function walk(value: unknown) {
    if (!value || typeof value !== "object" || seen.has(value)) return;
    seen.add(value);

    if (Array.isArray(value)) {
      for (const item of value) walk(item);
      return;
    }
    if (!isRecord(value)) return;

    if (typeof value.reference === "string") visit(value.reference);
    for (const child of Object.values(value)) walk(child);
  }

  walk(node);
}

function rewriteReferences(node: unknown, resolve: (reference: string) => string): void {
  const seen = new Set<unknown>();

  function walk(value: unknown) {
    if (!value || typeof value !== "object" || seen.has(value)) return;
    seen.add(value);

    if (Array.isArray(value)) {
      for (const item of value) walk(item);
      return;
    }
    if (!isRecord(value)) return;

    if (typeof value.reference === "string") value.reference = resolve(value.reference);
    for (const child of Object.values(value)) walk(child);
  }

  walk(node);
}

export function referencesIn(resource: FhirResource): string[] {
  const out: string[] = [];
  walkReferences(resource, (reference) => out.push(reference));
  return out;
}

/** References in a bundle that do not resolve to one of its own entries. */
export function findDanglingReferences(bundle: Bundle): string[] {
  const known = new Set<string>();
  for (const entry of bundle.entry) {
    known.add(entry.fullUrl);
    if (entry.resource.id) known.add(`${entry.resource.resourceType}/${entry.resource.id}`);
  }
  const dangling: string[] = [];
  for (const entry of bundle.entry) {
    for (const ref of referencesIn(entry.resource)) {
      if (!known.has(ref)) dangling.push(ref);
    }
  }
  return dangling;
}

/**
 * Greedy packing by patient group. A group is never split; a group larger than
 * `bundleSize` gets a bundle of its own.
 */
export function partitionGroups(groups: readonly AssemblyGroup[], bundleSize: number): AssemblyGroup[][] {
  const chunks: AssemblyGroup[][] = [];
  let current: AssemblyGroup[] = [];
  let size = 0;

  for (const group of groups) {
    const n = group.resources.length;
    if (n === 0) continue;
    if (current.length > 0 && size + n > bundleSize) {
      chunks.push(current);
      current = [];
      size = 0;
    }
    current.push(group);
    size += n;
  }
  if (current.length > 0 || chunks.length === 0) chunks.push(current);
  return chunks;
}

function assignIdentifiers(groups: readonly AssemblyGroup[], seed: number): Map<string, Assigned> {
  const assigned = new Map<string, Assigned>();
  for (const group of groups) {
    const rng = makeRng(deriveSeed(seed, "ids", group.index));
    for (const { handle } of group.resources) {
      assigned.set(`${handle.group}:${handle.ordinal}`, { id: rng.uuid(), resourceType: handle.resourceType });
    }
  }
  return assigned;
}

function requestFor(resource: FhirResource, id: string, method: RequestMethod): BundleEntry["request"] {
  if (method === "PUT") return { method: "PUT", url: `${resource.resourceType}/${id}` };
  if (resource.resourceType === "Patient") {
    const ident = resource.identifier?.[0];
    if (ident?.system && ident.value) {
      return { method: "POST", url: "Patient", ifNoneExist: `identifier=${ident.system}|${ident.value}` };
    }
  }
  return { method: "POST", url: resource.resourceType };
}

/**
 * Turn generated patient groups into one or more bundles: assign final ids,
 * rewrite placeholder references in one pass, attach transaction requests,
 * and verify that nothing points outside its own bundle.
 */
export function assembleBundles(groups: readonly AssemblyGroup[], options: AssembleOptions): Bundle[] {
  const ordered = [...groups].sort((a, b) => a.index - b.index);
  const assigned = assignIdentifiers(ordered, options.seed);
  const usePut = options.bundleType === "transaction" && options.requestMethod === "PUT";

  const resolve = (reference: string): string => {
    const draft = parseDraftReference(reference);
    if (!draft) return reference;
    const target = assigned.get(`${draft.group}:${draft.ordinal}`);
    if (!target) throw new IntegrityError("Reference to a resource that was never assembled", reference, -1);
    return usePut ? `${target.resourceType}/${target.id}` : `urn:uuid:${target.id}`;
  };

  const timestamp = isoDateTime(options.referenceDate);

  return partitionGroups(ordered, options.bundleSize).map((chunk, bundleIndex) => {
    const entry: BundleEntry[] = [];
    for (const group of chunk) {
      for (const { handle, resource } of group.resources) {
        const target = assigned.get(`${handle.group}:${handle.ordinal}`);
        if (!target) throw new IntegrityError("Resource has no assigned identifier", `${handle.group}:${handle.ordinal}`, bundleIndex);

        const copy = structuredClone(resource);
        try {
          rewriteReferences(copy, resolve);
        } catch (e) {
          if (e instanceof IntegrityError) throw new IntegrityError("Reference to a resource that was never assembled", e.reference, bundleIndex);
          throw e;
        }
        if (options.bundleType === "transaction" && options.requestMethod === "POST") delete copy.id;
        else copy.id = target.id;

        const item: BundleEntry = { fullUrl: `urn:uuid:${target.id}`, resource: copy };
        if (options.bundleType === "transaction") item.request = requestFor(copy, target.id, options.requestMethod);
        entry.push(item);
      }
    }

    const bundle: Bundle = {
      resourceType: "Bundle",
      id: makeRng(deriveSeed(options.seed, "bundle", bundleIndex)).uuid(),
      type: options.bundleType,
      timestamp,
      entry,
    };

    const dangling = findDanglingReferences(bundle);
    if (dangling.length > 0) throw new IntegrityError("Reference does not resolve inside its bundle", dangling[0], bundleIndex);
    return bundle;
  });
}
