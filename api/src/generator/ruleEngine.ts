import { evaluateCondition } from "./conditions";
import { ConfigurationError, type ConfigurationContext } from "./errors";
import type { Effect, Profile } from "./profile";
import { type PatientRecord, type ResourceHandle, referenceTo } from "./record";
import { resolveRelatedPerson } from "./relationships";
import {
  buildCondition,
  buildCoverage,
  buildDiagnosticReport,
  buildEncounter,
  buildImmunization,
  buildMedicationRequest,
  buildObservation,
  timePoints,
  type FactoryContext,
} from "./resources";

export type RuleSet = Pick<Profile, "rules" | "applyRulesToRelated" | "maxRelatedDepth">;

function annotate(e: unknown, context: ConfigurationContext): unknown {
  return e instanceof ConfigurationError ? e.within(context) : e;
}

function assertNever(effect: never): never {
  throw new Error(`Unhandled effect ${JSON.stringify(effect)}`);
}

function applyEffect(effect: Effect, record: PatientRecord, rules: RuleSet, ctx: FactoryContext): void {
  const subject = referenceTo(record.handle);

  switch (effect.kind) {
    case "AddCondition":
      record.attach(buildCondition(effect.def, subject, ctx));
      return;

    case "AddObservation":
      for (const when of timePoints(effect.def.times, ctx)) {
        record.attach(buildObservation(effect.def, subject, when, ctx));
      }
      return;

    case "AddEncounter": {
      const { def } = effect;
      const spread = def.qty > 1 && def.spread_months > 0;
      const daysBetween = Math.floor((def.spread_months * 30) / def.qty);
      for (let i = 0; i < def.qty; i++) {
        const daysAgo = spread ? (def.days_ago ?? 0) + i * daysBetween : def.days_ago ?? ctx.rng.int(1, 90);
        record.attach(buildEncounter(def, subject, daysAgo, ctx));
      }
      return;
    }

    case "AddMedicationRequest":
      record.attach(buildMedicationRequest(effect.def, subject, ctx));
      return;

    case "AddRelatedPerson": {
      const { record: related } = resolveRelatedPerson(effect.def, effect.relationship, record, ctx);
      const optedIn = effect.def.apply_rules ?? rules.applyRulesToRelated;
      if (optedIn && related.depth <= rules.maxRelatedDepth) applyRules(rules, related, ctx);
      return;
    }

    case "AddDiagnosticReport": {
      const results: ResourceHandle[] = [];
      for (const obsDef of effect.def.observations) {
        for (const when of timePoints(obsDef.times, ctx)) {
          results.push(record.attach(buildObservation(obsDef, subject, when, ctx)));
        }
      }
      record.attach(buildDiagnosticReport(effect.def, subject, results.map((h) => referenceTo(h)), ctx));
      return;
    }

    case "AddImmunization":
      for (let dose = 1; dose <= effect.def.qty; dose++) {
        record.attach(buildImmunization(effect.def, subject, dose, ctx));
      }
      return;

    case "AddCoverage":
      record.attach(buildCoverage(effect.def, subject, ctx));
      return;

    case "SetAttributes":
      for (const [name, value] of Object.entries(effect.values)) record.setAttribute(name, value);
      return;

    default:
      assertNever(effect);
  }
}

/**
 * Evaluate rules in declaration order against the record's current state;
 * effects of earlier rules are visible to later conditions. Any failure
 * aborts with the rule, effect and patient it happened under.
 */
export function applyRules(rules: RuleSet, record: PatientRecord, ctx: FactoryContext): void {
  for (const rule of rules.rules) {
    let fires: boolean;
    try {
      fires = evaluateCondition(rule.condition, record.view());
    } catch (e) {
      throw annotate(e, { rule: rule.name, patientIndex: record.patientIndex });
    }
    if (!fires) continue;

    for (const effect of rule.effects) {
      try {
        applyEffect(effect, record, rules, ctx);
      } catch (e) {
        throw annotate(e, { rule: rule.name, effect: effect.kind, patientIndex: record.patientIndex });
      }
    }
  }
}
