import { processResourceList, isDeprecated, byName, compareStrings } from "../resource-list";
import { nameFromSelfLink } from "../self-link";
import { buildLabelsFilterString } from "../labels";
import { InvalidArgumentError } from "../../errors";

describe("processResourceList", () => {
  it("drops deprecated regions and sorts by name", () => {
    const regions = [
      { name: "b", deprecated: null },
      { name: "a", deprecated: { state: "DEPRECATED" } },
      { name: "c", deprecated: undefined },
    ];

    const result = processResourceList(regions, (r) => !isDeprecated(r.deprecated), byName);

    expect(result.map((r) => r.name)).toEqual(["b", "c"]);
  });

  it("treats a missing list as empty", () => {
    expect(processResourceList<{ name?: string }>(undefined, () => true, byName)).toEqual([]);
    expect(processResourceList(null)).toEqual([]);
  });

  it("does not mutate the input", () => {
    const input = [{ name: "z" }, { name: "m" }];
    const result = processResourceList(input, undefined, byName);

    expect(result.map((r) => r.name)).toEqual(["m", "z"]);
    expect(input.map((r) => r.name)).toEqual(["z", "m"]);
  });

  it("sorts by code unit, uppercase before lowercase", () => {
    expect(["b", "B", "a"].sort(compareStrings)).toEqual(["B", "a", "b"]);
  });
});

describe("isDeprecated", () => {
  it.each([
    [null, false],
    [{}, false],
    [{ state: "ACTIVE" }, false],
    [{ state: "OBSOLETE" }, false],
    [{ state: "deprecated" }, true],
    [{ state: "DEPRECATED" }, true],
  ])("%p -> %p", (status, expected) => {
    expect(isDeprecated(status)).toBe(expected);
  });
});

describe("nameFromSelfLink", () => {
  it("returns the last path segment", () => {
    expect(
      nameFromSelfLink("https://www.googleapis.com/compute/v1/projects/test-project/zones/us-central1-a")
    ).toBe("us-central1-a");
  });

  it("returns plain names unchanged", () => {
    expect(nameFromSelfLink("us-central1-a")).toBe("us-central1-a");
  });
});

describe("buildLabelsFilterString", () => {
  it("joins one clause per label", () => {
    expect(buildLabelsFilterString({ env: "prod", team: "infra" })).toBe(
      '(labels.env = "prod") AND (labels.team = "infra")'
    );
  });

  it("returns an empty filter for no labels", () => {
    expect(buildLabelsFilterString({})).toBe("");
  });

  it("escapes quotes and backslashes in values", () => {
    expect(buildLabelsFilterString({ note: 'say "hi" \\ bye' })).toBe(
      String.raw`(labels.note = "say \"hi\" \\ bye")`
    );
  });

  it.each(["env) OR (labels.x", "a b", 'k"', ""])("rejects label key %p", (key) => {
    expect(() => buildLabelsFilterString({ [key]: "v" })).toThrow(InvalidArgumentError);
  });
});
