import { describe, expect, it } from "vitest";
import { filterChoices, filterItems, NO_FILTER } from "./filters";
import { EMPTY_BANK } from "./itemBank";
import { makeBank, makeItem, threeItemBank } from "./test/fixtures";

describe("filterChoices", () => {
  it("lists All first, then the distinct sorted values", () => {
    const bank = makeBank([
      makeItem("1", { domain: "Resp" }),
      makeItem("2", { domain: "Cardio" }),
      makeItem("3", { domain: "Resp" }),
      makeItem("4", { domain: "Endo" }),
    ]);
    expect(filterChoices(bank, "domain")).toEqual(["All", "Cardio", "Endo", "Resp"]);
  });

  it("works per attribute", () => {
    expect(filterChoices(threeItemBank(), "subSpecialty")).toEqual(["All", "AF", "Asthma", "HTN"]);
  });

  it("is just All for an empty bank", () => {
    expect(filterChoices(EMPTY_BANK, "domain")).toEqual(["All"]);
    expect(filterChoices(EMPTY_BANK, "subSpecialty")).toEqual(["All"]);
  });
});

describe("filterItems", () => {
  const bank = threeItemBank();

  it("returns the whole bank with no filter", () => {
    expect(filterItems(bank, NO_FILTER).map((i) => i.caseId)).toEqual(["C1", "C2", "R1"]);
  });

  it("matches domain exactly", () => {
    expect(filterItems(bank, { domain: "Cardio", subSpecialty: "All" }).map((i) => i.caseId)).toEqual(["C1", "C2"]);
    expect(filterItems(bank, { domain: "cardio", subSpecialty: "All" })).toEqual([]);
    expect(filterItems(bank, { domain: "Card", subSpecialty: "All" })).toEqual([]);
  });

  it("combines both criteria", () => {
    expect(filterItems(bank, { domain: "Cardio", subSpecialty: "AF" }).map((i) => i.caseId)).toEqual(["C2"]);
    expect(filterItems(bank, { domain: "Resp", subSpecialty: "AF" })).toEqual([]);
  });

  it("gives the same view for the same criteria regardless of history", () => {
    const criteria = { domain: "Cardio", subSpecialty: "All" };
    const first = filterItems(bank, criteria);
    filterItems(bank, { domain: "Resp", subSpecialty: "Asthma" });
    filterItems(bank, { domain: "All", subSpecialty: "AF" });
    expect(filterItems(bank, criteria)).toEqual(first);
  });
});
