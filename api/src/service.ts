import { z } from "zod";
import type { ErrorResponse, GenerateRequest, GenerateResponse } from "@cohortgen/shared";
import type { Config } from "./config";
import { ConfigurationError, IntegrityError } from "./generator/errors";
import { generate } from "./generator/generate";
import { loadProfile } from "./generator/profile";
import { loadPersona } from "./personas";

const GenerateRequestSchema = z
  .object({
    profile: z.unknown().optional(),
    persona: z.string().min(1).optional(),
    seed: z.number().int().nonnegative().optional(),
    count: z.number().int().nonnegative().optional(),
    offset: z.number().int().nonnegative().optional(),
    bundleType: z.enum(["transaction", "collection"]).optional(),
    bundleSize: z.number().int().positive().optional(),
    requestMethod: z.enum(["POST", "PUT"]).optional(),
    referenceDate: z.string().optional(),
  })
  .refine((b) => (b.profile === undefined) !== (b.persona === undefined), {
    message: "exactly one of profile or persona is required",
  });

export type ServiceResult =
  | { statusCode: 200; body: GenerateResponse }
  | { statusCode: 400 | 422 | 500; body: ErrorResponse };

export function errorResponse(e: unknown): { statusCode: 422 | 500; body: ErrorResponse } {
  if (e instanceof ConfigurationError) {
    return { statusCode: 422, body: { error: e.message, kind: "configuration", details: { ...e.context } } };
  }
  if (e instanceof IntegrityError) {
    return {
      statusCode: 500,
      body: { error: e.message, kind: "integrity", details: { reference: e.reference, bundleIndex: e.bundleIndex } },
    };
  }
  const message = e instanceof Error ? e.message : "server error";
  return { statusCode: 500, body: { error: message } };
}

/** Shared by the Lambda handler and the Express route. */
export function runGenerate(body: unknown, config: Config): ServiceResult {
  const parsed = GenerateRequestSchema.safeParse(body);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
    return { statusCode: 400, body: { error: `Invalid request: ${detail}`, kind: "request" } };
  }
  const req: GenerateRequest = parsed.data;

  if (req.count !== undefined && req.count > config.maxCount) {
    return { statusCode: 400, body: { error: `count ${req.count} exceeds the limit of ${config.maxCount}`, kind: "request" } };
  }

  try {
    const profile = req.persona ? loadPersona(req.persona) : loadProfile(req.profile);
    const result = generate(profile, {
      seed: req.seed ?? config.fixedSeed,
      count: req.count,
      offset: req.offset,
      bundleType: req.bundleType,
      bundleSize: req.bundleSize ?? profile.output.bundleSize ?? config.defaultBundleSize,
      requestMethod: req.requestMethod,
      referenceDate: req.referenceDate,
    });
    return { statusCode: 200, body: result };
  } catch (e) {
    return errorResponse(e);
  }
}
