// src/lib/_test_/translate.test.ts

import { afterEach, describe, expect, it } from "vitest";
import { negotiateLanguage, setDefaultLanguage, translate } from "../i18n/translate";
import { setRequestContext, withRequestContext } from "../observability/request-context";

describe("translate", () => {
  afterEach(() => {
    setDefaultLanguage("en");
  });

  it("fills placeholders", () => {
    expect(translate("stringTooLong", { label: "Name", max: 255 })).toBe(
      "Name should contain at most 255 characters.",
    );
  });

  it("leaves unknown placeholders in place", () => {
    expect(translate("required")).toBe("{label} cannot be blank.");
  });

  it("uses an explicit language over the default", () => {
    expect(translate("dataNotFound", {}, "id")).toBe("Data tidak ditemukan.");
  });

  it("follows the request language", async () => {
    const message = await withRequestContext(async () => {
      setRequestContext({ language: "id" });
      return translate("routeNotFound");
    });

    expect(message).toBe("Rute tidak ditemukan.");
    expect(translate("routeNotFound")).toBe("Route not found.");
  });

  it("ignores an unsupported default language", () => {
    setDefaultLanguage("fr");
    expect(translate("success")).toBe("Success.");

    setDefaultLanguage("id");
    expect(translate("success")).toBe("Berhasil.");
  });
});

describe("negotiateLanguage", () => {
  it("picks the highest weighted supported language", () => {
    expect(negotiateLanguage("fr-FR, id;q=0.8, en;q=0.5")).toBe("id");
    expect(negotiateLanguage("en-US,en;q=0.9")).toBe("en");
  });

  it("returns undefined when nothing is supported", () => {
    expect(negotiateLanguage("fr, de;q=0.5")).toBeUndefined();
    expect(negotiateLanguage(undefined)).toBeUndefined();
  });
});
