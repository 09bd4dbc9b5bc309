/**
 * Field Normalization Tests
 *
 * Rates, dates, case identifiers, product codes and country names, plus
 * idempotence of the full record normalizer.
 */

import { describe, it, expect } from "vitest";
import { CountryDirectory } from "@/lib/reconciler/country-names";
import {
  FieldNormalizer,
  cleanText,
  normalizeCaseNumber,
  normalizeDate,
  normalizeTariffType,
  parseTariffRate,
} from "@/lib/reconciler/field-normalization";
import { getJurisdictionStrategy } from "@/lib/reconciler/jurisdictions";
import { MIN_PRICE_SENTINEL } from "@/lib/reconciler/types";
import { makeRawRecord } from "@test/helpers/records";

const countries = new CountryDirectory({
  "South Korea": ["Korea", "Republic of Korea"],
  China: ["People's Republic of China", "PRC"],
  USA: ["United States", "U.S."],
});

describe("field-normalization", () => {
  describe("cleanText", () => {
    it("trims and nulls blanks and the literal null", () => {
      expect(cleanText("  Acme Steel ")).toBe("Acme Steel");
      expect(cleanText("   ")).toBeNull();
      expect(cleanText("NULL")).toBeNull();
      expect(cleanText(null)).toBeNull();
    });
  });

  describe("normalizeTariffType", () => {
    it("maps duty wording onto canonical types", () => {
      expect(normalizeTariffType("Anti-Dumping Duty")).toBe("Antidumping");
      expect(normalizeTariffType("AD")).toBe("Antidumping");
      expect(normalizeTariffType("countervailing duty")).toBe("Countervailing");
      expect(normalizeTariffType("CVD")).toBe("Countervailing");
      expect(normalizeTariffType("Provisional safeguard")).toBe("Safeguard");
    });

    it("passes unknown types through trimmed", () => {
      expect(normalizeTariffType(" Retaliatory ")).toBe("Retaliatory");
    });
  });

  describe("normalizeCaseNumber", () => {
    it("canonicalizes dashes, spacing and case", () => {
      expect(normalizeCaseNumber("a–580–881")).toBe("A-580-881");
      expect(normalizeCaseNumber("C - 580 - 882")).toBe("C-580-882");
    });

    it("keeps the first of several identifiers", () => {
      expect(normalizeCaseNumber("A-580-881, C-580-882")).toBe("A-580-881");
      expect(normalizeCaseNumber("A-580-881; A-580-883")).toBe("A-580-881");
    });

    it("rejects identifiers that do not fit the pattern", () => {
      expect(normalizeCaseNumber("580-881")).toBeNull();
      expect(normalizeCaseNumber("AD-580-881")).toBeNull();
      expect(normalizeCaseNumber("AD 2023/01")).toBeNull();
    });
  });

  describe("parseTariffRate", () => {
    it("parses percentages in their common spellings", () => {
      expect(parseTariffRate("5.5%")).toEqual({ kind: "rate", rate: 5.5 });
      expect(parseTariffRate("12,3 %")).toEqual({ kind: "rate", rate: 12.3 });
      expect(parseTariffRate("10 per cent")).toEqual({ kind: "rate", rate: 10 });
      expect(parseTariffRate(7)).toEqual({ kind: "rate", rate: 7 });
    });

    it("treats Nil as zero", () => {
      expect(parseTariffRate("Nil")).toEqual({ kind: "rate", rate: 0 });
    });

    it("recognizes minimum-price schemes", () => {
      expect(parseTariffRate("Minimum import price of EUR 500/t")).toEqual({
        kind: "min_price",
        text: "Minimum import price of EUR 500/t",
      });
      expect(parseTariffRate(MIN_PRICE_SENTINEL)).toEqual({ kind: "rate", rate: MIN_PRICE_SENTINEL });
    });

    it("reports free text as unparseable", () => {
      expect(parseTariffRate("see Annex I")).toEqual({ kind: "unparseable", text: "see Annex I" });
    });

    it("nulls absent and non-finite values", () => {
      expect(parseTariffRate(null)).toEqual({ kind: "rate", rate: null });
      expect(parseTariffRate("null")).toEqual({ kind: "rate", rate: null });
      expect(parseTariffRate(Number.POSITIVE_INFINITY)).toEqual({ kind: "rate", rate: null });
    });
  });

  describe("normalizeDate", () => {
    it("accepts the supported layouts", () => {
      expect(normalizeDate("2023-01-05")).toBe("2023-01-05");
      expect(normalizeDate("2023-01-05T00:00:00Z")).toBe("2023-01-05");
      expect(normalizeDate("2023/1/5")).toBe("2023-01-05");
      expect(normalizeDate("05.01.2023")).toBe("2023-01-05");
      expect(normalizeDate("January 5, 2023")).toBe("2023-01-05");
      expect(normalizeDate("Sept. 5, 2023")).toBe("2023-09-05");
      expect(normalizeDate("5 Jan 2023")).toBe("2023-01-05");
    });

    it("rejects impossible and unrecognized dates", () => {
      expect(normalizeDate("2023-02-30")).toBeNull();
      expect(normalizeDate("Q3 2023")).toBeNull();
      expect(normalizeDate("5 Foo 2023")).toBeNull();
    });
  });

  describe("FieldNormalizer", () => {
    it("canonicalizes a full record", () => {
      const normalizer = new FieldNormalizer({ countries });
      const { record, annotations } = normalizer.normalize(
        makeRawRecord({
          issuingCountry: "United States",
          country: "Korea",
          hsCode: " 7210.49 ",
          tariffType: "anti-dumping",
          tariffRate: "5.5%",
          effectiveDateFrom: "January 5, 2023",
          company: " Acme Steel ",
          caseNumber: "a-580-881",
        }),
      );

      expect(annotations).toEqual([]);
      expect(record).toMatchObject({
        issuingCountry: "USA",
        country: "South Korea",
        hsCode: "7210.49",
        tariffType: "Antidumping",
        tariffRate: 5.5,
        effectiveDateFrom: "2023-01-05",
        company: "Acme Steel",
        caseNumber: "A-580-881",
      });
    });

    it("nulls rejected values and annotates each one", () => {
      const normalizer = new FieldNormalizer({ countries });
      const { record, annotations } = normalizer.normalize(
        makeRawRecord({
          country: "Country name",
          hsCode: "HS 7210",
          caseNumber: "pending",
          effectiveDateTo: "until further notice",
        }),
      );

      expect(record.country).toBeNull();
      expect(record.hsCode).toBeNull();
      expect(record.caseNumber).toBeNull();
      expect(record.effectiveDateTo).toBeNull();
      expect(annotations).toEqual([
        { field: "country", value: "Country name", reason: "placeholder" },
        { field: "caseNumber", value: "pending", reason: "invalid_case_number" },
        { field: "hsCode", value: "HS 7210", reason: "invalid_code", detail: "non_numeric" },
        { field: "effectiveDateTo", value: "until further notice", reason: "invalid_date" },
      ]);
    });

    it("moves minimum-price wording into an empty note", () => {
      const normalizer = new FieldNormalizer({ countries });
      const { record } = normalizer.normalize(makeRawRecord({ tariffRate: "price undertaking" }));
      expect(record.tariffRate).toBe(MIN_PRICE_SENTINEL);
      expect(record.note).toBe("price undertaking");
    });

    it("keeps an existing note when the rate is unparseable", () => {
      const normalizer = new FieldNormalizer({ countries });
      const { record, annotations } = normalizer.normalize(
        makeRawRecord({ tariffRate: "see Annex I", note: "exporter-specific" }),
      );
      expect(record.tariffRate).toBeNull();
      expect(record.note).toBe("exporter-specific");
      expect(annotations).toEqual([{ field: "tariffRate", value: "see Annex I", reason: "unparseable_rate" }]);
    });

    it("rejects codes outside the chapter allowlist", () => {
      const normalizer = new FieldNormalizer({ countries, chapterAllowlist: ["72", "73"] });
      const { record, annotations } = normalizer.normalize(makeRawRecord({ hsCode: "8501.10" }));
      expect(record.hsCode).toBeNull();
      expect(annotations[0]).toEqual({ field: "hsCode", value: "8501.10", reason: "invalid_code", detail: "chapter" });
    });

    it("drops non-Latin company names for Malaysian documents", () => {
      const normalizer = new FieldNormalizer({ countries, strategy: getJurisdictionStrategy("malaysia") });
      const { record, annotations } = normalizer.normalize(
        makeRawRecord({ company: "株式会社", hsCode: "7210.49.11  00", tariffRate: "Nil" }),
      );
      expect(record.company).toBeNull();
      expect(record.hsCode).toBe("7210.49.11 00");
      expect(record.tariffRate).toBe(0);
      expect(annotations).toEqual([
        { field: "company", value: "株式会社", reason: "non_latin_company" },
      ]);
    });

    it("is idempotent", () => {
      const normalizer = new FieldNormalizer({ countries });
      const first = normalizer.normalize(
        makeRawRecord({
          country: "PRC",
          hsCode: "721049",
          tariffRate: "MIP",
          effectiveDateFrom: "05.01.2023",
          investigationPeriodTo: "2022/12/31",
          caseNumber: "A-570-001",
        }),
      ).record;
      const second = normalizer.normalize(first);
      expect(second.record).toEqual(first);
      expect(second.annotations).toEqual([]);
    });
  });
});
