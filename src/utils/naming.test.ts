import { describe, expect, it } from "vitest";

import {
  generateIdentifier,
  isValidIdentifier,
  singularize,
  splitWords,
} from "./naming";

describe("splitWords", () => {
  it("splits on dashes and underscores", () => {
    expect(splitWords("user-profile_image")).toEqual(["user", "profile", "image"]);
  });

  it("splits on camelCase boundaries", () => {
    expect(splitWords("imageURL")).toEqual(["image", "URL"]);
  });

  it("splits after digits", () => {
    expect(splitWords("version2Id")).toEqual(["version2", "Id"]);
  });
});

describe("generateIdentifier", () => {
  it("converts snake_case to an exported identifier", () => {
    expect(generateIdentifier("first_name", true)).toBe("FirstName");
  });

  it("converts kebab-case to an unexported identifier", () => {
    expect(generateIdentifier("user-profile", false)).toBe("userProfile");
  });

  it("keeps camelCase word boundaries", () => {
    expect(generateIdentifier("firstName", true)).toBe("FirstName");
    expect(generateIdentifier("FirstName", false)).toBe("firstName");
  });

  it("upper-cases common initialisms", () => {
    expect(generateIdentifier("user_id", true)).toBe("UserID");
    expect(generateIdentifier("imageURL", true)).toBe("ImageURL");
    expect(generateIdentifier("http_request", true)).toBe("HTTPRequest");
    expect(generateIdentifier("version2Id", true)).toBe("Version2ID");
  });

  it("lower-cases a leading initialism when unexported", () => {
    expect(generateIdentifier("id", false)).toBe("id");
    expect(generateIdentifier("api-key", false)).toBe("apiKey");
  });

  it("title-cases letters after punctuation and drops the punctuation", () => {
    expect(generateIdentifier("foo.bar baz", true)).toBe("FooBarBaz");
    expect(generateIdentifier("$ref", true)).toBe("Ref");
  });

  it("drops leading digits", () => {
    expect(generateIdentifier("2nd-place", true)).toBe("NdPlace");
    expect(generateIdentifier("2nd-place", false)).toBe("ndPlace");
  });

  it("drops every leading digit of a multi-digit prefix", () => {
    expect(generateIdentifier("12abc", true)).toBe("Abc");
    expect(generateIdentifier("12abc", false)).toBe("abc");
    expect(generateIdentifier("123", true)).toBe("");
    expect(isValidIdentifier(generateIdentifier("404-not-found", true))).toBe(true);
  });

  it("keeps digits after the first letter", () => {
    expect(generateIdentifier("1a2b", true)).toBe("A2b");
  });

  it("returns an empty string when nothing is usable", () => {
    expect(generateIdentifier("---", true)).toBe("");
    expect(generateIdentifier("", false)).toBe("");
  });
});

describe("singularize", () => {
  it("singularizes plural names", () => {
    expect(singularize("Items")).toBe("Item");
    expect(singularize("categories")).toBe("category");
    expect(singularize("tags")).toBe("tag");
  });

  it("appends Item when the name doesn't change", () => {
    expect(singularize("Sheep")).toBe("SheepItem");
    expect(singularize("Root")).toBe("RootItem");
  });
});

describe("isValidIdentifier", () => {
  it("accepts identifiers", () => {
    expect(isValidIdentifier("Schema")).toBe(true);
    expect(isValidIdentifier("_internal2")).toBe(true);
  });

  it("rejects identifiers starting with a digit", () => {
    expect(isValidIdentifier("1Schema")).toBe(false);
  });

  it("rejects punctuation and empty names", () => {
    expect(isValidIdentifier("user-profile")).toBe(false);
    expect(isValidIdentifier("")).toBe(false);
  });
});
