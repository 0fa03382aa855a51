import { describe, it, expect } from "vitest";
import { generate } from "../src/generator/generate";
import { loadProfile } from "../src/generator/profile";
import { parseReferenceDate } from "../src/generator/dates";
import { makeRng } from "../src/generator/random";
import { PatientGroup } from "../src/generator/record";
import { relationshipFor, resolveRelatedPerson } from "../src/generator/relationships";
import { buildPatient } from "../src/generator/resources";
import { REFERENCE_DATE, resourcesOf, typesIn } from "./helpers";

describe("relationshipFor", () => {
  it("normalises keywords and pairs them with their inverse", () => {
    expect(relationshipFor(" Parent ")).toEqual({ relationship: "parent", inverse: "child" });
    expect(relationshipFor("child")).toEqual({ relationship: "child", inverse: "parent" });
    expect(relationshipFor("spouse")).toEqual({ relationship: "spouse", inverse: "spouse" });
    expect(relationshipFor("guardian")).toEqual({ relationship: "guardian", inverse: "child" });
  });

  it("rejects unknown keywords by name", () => {
    expect(() => relationshipFor("cousin")).toThrow(/Unknown relationship keyword "cousin"/);
  });
});

describe("resolveRelatedPerson", () => {
  it("links both sides with the keyword it is given", () => {
    const group = new PatientGroup(0);
    const origin = group.createRecord(buildPatient({ name: { family: "Berg", given: ["Mary"] }, gender: "female" }, "MRN-TEST"), {}, 0);
    const ctx = { rng: makeRng(1), referenceDate: parseReferenceDate(REFERENCE_DATE) };
    const def = { name: { family: "Berg", given: ["Ilse"] }, relationship: "legal guardian", active: true };

    const { record } = resolveRelatedPerson(def, "guardian", origin, ctx);

    expect(record.depth).toBe(1);
    const texts = group.resources.flatMap((d) =>
      d.resource.resourceType === "RelatedPerson" ? [d.resource.relationship[0].text] : []
    );
    expect(texts).toEqual(["guardian", "child"]);
  });
});

describe("related persons", () => {
  const profile = loadProfile({
    mode: "single",
    single_patient: {
      name: { family: "Berg", given: ["Mary"] },
      gender: "female",
      birthDate: "1956-09-03",
      identifiers: [{ system: "http://hospital.example/mrn", value: "MRN-TEST-1" }],
    },
    resources: {
      rules: [
        {
          name: "daughter",
          then: {
            related_persons: [
              {
                name: { family: "Berg", given: ["Anouk"] },
                relationship: "child",
                gender: "female",
                birthDate: "1984-02-20",
                contact: { phone: "555-0100" },
              },
            ],
          },
        },
      ],
    },
  });

  const [bundle] = generate(profile, { seed: 7, referenceDate: REFERENCE_DATE, bundleType: "collection" }).bundles;
  const urlOf = (id: string | undefined) => `urn:uuid:${id}`;

  it("adds one Patient and a RelatedPerson on each side", () => {
    expect(typesIn(bundle)).toEqual(["Patient", "Patient", "RelatedPerson", "RelatedPerson"]);
  });

  it("links Mary's side to Anouk as child and Anouk's side to Mary as parent", () => {
    const [mary, anouk] = resourcesOf(bundle, "Patient");
    expect(mary.name[0]).toEqual({ family: "Berg", given: ["Mary"] });
    expect(anouk.name[0]).toEqual({ family: "Berg", given: ["Anouk"] });

    const related = resourcesOf(bundle, "RelatedPerson");
    const marySide = related.find((r) => r.patient.reference === urlOf(mary.id));
    const anoukSide = related.find((r) => r.patient.reference === urlOf(anouk.id));

    expect(marySide?.relationship[0].coding?.[0]).toMatchObject({ code: "CHILD", display: "child" });
    expect(marySide?.relationship[0].text).toBe("child");
    expect(marySide?.extension[0].valueReference?.reference).toBe(urlOf(anouk.id));
    expect(marySide?.name[0]).toEqual({ family: "Berg", given: ["Anouk"] });
    expect(marySide?.telecom).toEqual([{ system: "phone", value: "555-0100", use: "home" }]);

    expect(anoukSide?.relationship[0].coding?.[0]).toMatchObject({ code: "PRN", display: "parent" });
    expect(anoukSide?.relationship[0].text).toBe("parent");
    expect(anoukSide?.extension[0].valueReference?.reference).toBe(urlOf(mary.id));
    expect(anoukSide?.name[0]).toEqual({ family: "Berg", given: ["Mary"] });
    expect(anoukSide?.birthDate).toBe("1956-09-03");
  });

  it("gives the new patient its own generated identifier", () => {
    const [, anouk] = resourcesOf(bundle, "Patient");
    expect(anouk.identifier?.[0].value).toMatch(/^MRN-[0-9a-f]{8}$/);
    expect(anouk.birthDate).toBe("1984-02-20");
  });
});
