import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../src/generator/errors";
import { loadProfile } from "../src/generator/profile";

function configurationError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigurationError) return e;
    throw e;
  }
  throw new Error("expected a ConfigurationError");
}

describe("loadProfile", () => {
  it("fills in defaults", () => {
    const profile = loadProfile({});
    expect(profile.mode).toBe("cohort");
    expect(profile.include).toEqual([]);
    expect(profile.rules).toEqual([]);
    expect(profile.applyRulesToRelated).toBe(false);
    expect(profile.maxRelatedDepth).toBe(1);
    expect(profile.output).toEqual({ mode: "transaction", bundleSize: undefined, requestMethod: "POST" });
  });

  it("compiles rules into conditions and tagged effects", () => {
    const profile = loadProfile({
      resources: {
        rules: [
          {
            name: "older",
            when: { condition: "age > 45" },
            then: {
              add_conditions: [{ code: { code: "38341003", display: "Hypertension" } }],
              add_encounters: [{ class: "AMB" }],
              encounters: [{ class: "EMER" }],
              set_attributes: { hypertensive: true },
            },
          },
        ],
      },
    });
    const [rule] = profile.rules;
    expect(rule.name).toBe("older");
    expect(rule.condition).toMatchObject({ kind: "compare", attribute: "age", op: ">", value: 45 });
    expect(rule.effects.map((e) => e.kind)).toEqual(["AddCondition", "AddEncounter", "AddEncounter", "SetAttributes"]);
  });

  it("keeps effects in the order the then block lists them", () => {
    const profile = loadProfile({
      resources: {
        rules: [
          {
            name: "mixed",
            then: {
              meds: [{ rxnorm: "860975" }],
              set_attributes: { treated: true },
              related_persons: [{ name: { family: "Berg" }, relationship: "spouse" }],
              add_conditions: [{ code: { code: "44054006" } }],
            },
          },
        ],
      },
    });
    expect(profile.rules[0].effects.map((e) => e.kind)).toEqual([
      "AddMedicationRequest",
      "SetAttributes",
      "AddRelatedPerson",
      "AddCondition",
    ]);
  });

  it("rejects a misspelled key in a rule's when block", () => {
    const err = configurationError(() =>
      loadProfile({ resources: { rules: [{ name: "older", when: { conditon: "age > 45" } }] } })
    );
    expect(err.context.path).toBe("resources.rules.0.when");
    expect(err.message).toMatch(/conditon/);
  });

  it("rejects a misspelled effect key", () => {
    const err = configurationError(() =>
      loadProfile({ resources: { rules: [{ name: "older", then: { add_conditons: [{ code: { code: "38341003" } }] } }] } })
    );
    expect(err.context.path).toBe("resources.rules.0.then");
    expect(err.message).toMatch(/add_conditons/);
  });

  it("rejects unknown fields inside effect definitions and blocks", () => {
    expect(
      configurationError(() =>
        loadProfile({ resources: { rules: [{ name: "r", then: { meds: [{ rxnorm: "860975", dose: "10mg" }] } }] } })
      ).context.path
    ).toBe("resources.rules.0.then.meds.0");
    expect(configurationError(() => loadProfile({ resources: { inclde: ["Condition"] } })).context.path).toBe("resources");
    expect(configurationError(() => loadProfile({ output: { bundlesize: 10 } })).context.path).toBe("output");
  });

  it("reports schema violations with their path", () => {
    const err = configurationError(() => loadProfile({ mode: "weird" }));
    expect(err.context.path).toBe("mode");
    expect(err.message).toMatch(/^Invalid profile: mode:/);
  });

  it("requires single_patient in single mode", () => {
    expect(() => loadProfile({ mode: "single" })).toThrow(/single_patient/);
  });

  it("rejects an unknown relationship keyword with the rule name", () => {
    const err = configurationError(() =>
      loadProfile({
        resources: {
          rules: [{ name: "family", then: { related_persons: [{ name: { family: "Berg" }, relationship: "cousin" }] } }],
        },
      })
    );
    expect(err.detail).toMatch(/Unknown relationship keyword "cousin"/);
    expect(err.context).toEqual({ rule: "family", effect: "AddRelatedPerson" });
  });

  it("rejects conditions over undeclared attributes", () => {
    const err = configurationError(() =>
      loadProfile({ resources: { rules: [{ name: "smokers", when: { condition: "smoker == yes" } }] } })
    );
    expect(err.message).toBe('Condition references undeclared attribute "smoker" [rule "smokers"]');
  });

  it("declares sampled attributes and attributes set by earlier rules", () => {
    const profile = loadProfile({
      demographics: { smoker: { distribution: { yes: 1, no: 1 } } },
      resources: {
        rules: [
          { name: "flag", then: { set_attributes: { flagged: true } } },
          { name: "use flag", when: { condition: "flagged == true" } },
          { name: "use smoker", when: { condition: "smoker == yes" } },
          { name: "use counts", when: { condition: "resources.Condition > 0" } },
        ],
      },
    });
    expect(profile.rules).toHaveLength(4);
  });

  it("does not let a rule read an attribute set by a later rule", () => {
    expect(() =>
      loadProfile({
        resources: {
          rules: [
            { name: "too early", when: { condition: "flagged == true" } },
            { name: "flag", then: { set_attributes: { flagged: true } } },
          ],
        },
      })
    ).toThrow(ConfigurationError);
  });

  it("declares age in single mode only when a birth date is given", () => {
    const withoutBirthDate = { mode: "single", single_patient: { name: { family: "Doe" } } };
    expect(() =>
      loadProfile({ ...withoutBirthDate, resources: { rules: [{ name: "r", when: { condition: "age > 1" } }] } })
    ).toThrow(/undeclared attribute "age"/);
    expect(() =>
      loadProfile({
        mode: "single",
        single_patient: { name: { family: "Doe" }, birthDate: "1990-01-01" },
        resources: { rules: [{ name: "r", when: { condition: "age > 1" } }] },
      })
    ).not.toThrow();
  });

  it("rejects invalid demographics before generation", () => {
    expect(() => loadProfile({ demographics: { age: { min: 90, max: 18 } } })).toThrow(/min 90 > max 18/);
  });

  it("rejects an age range with no whole year in it", () => {
    const err = configurationError(() => loadProfile({ demographics: { age: { min: 30.5, max: 30.7 } } }));
    expect(err.context.path).toBe("demographics.age");
    expect(err.detail).toBe("Range for \"age\" contains no whole number (30.5 to 30.7)");
  });
});
