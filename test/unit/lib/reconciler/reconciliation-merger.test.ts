/**
 * Reconciliation Merger Tests
 *
 * Insert / merge / unchanged outcomes against the in-process fact store,
 * identity matching variants and store rejections.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  ReconciliationMerger,
  collectNullFills,
  identityKey,
  isRefinementOf,
  isSubsumedBy,
  mergeRecord,
} from "@/lib/reconciler/reconciliation-merger";
import { InMemoryFactStore } from "@test/helpers/in-memory-fact-store";
import { makeRecord } from "@test/helpers/records";

const DOC = "USA_A-580-881_Final.pdf";
const CASE = "A-580-881";

const acme = makeRecord({ country: "South Korea", company: "Acme", hsCode: "7210.49.11", caseNumber: CASE });

describe("reconciliation-merger", () => {
  describe("identity helpers", () => {
    it("compares the identity tuple only", () => {
      expect(identityKey(acme)).toBe(identityKey({ ...acme, tariffRate: 5.5, note: "x" }));
      expect(identityKey(acme)).not.toBe(identityKey({ ...acme, company: "Bolt" }));
    });

    it("recognizes a record refining a partial fact", () => {
      const partial = { ...acme, hsCode: null };
      expect(isRefinementOf(partial, acme)).toBe(true);
      expect(isRefinementOf(acme, acme)).toBe(false);
      expect(isRefinementOf(partial, { ...acme, company: "Bolt" })).toBe(false);
    });

    it("never treats a null company or country as refinable", () => {
      const countryWide = { ...acme, company: null };
      expect(isRefinementOf(countryWide, acme)).toBe(false);
      expect(isSubsumedBy(acme, countryWide)).toBe(false);
      expect(isRefinementOf({ ...acme, country: null, hsCode: null }, acme)).toBe(false);
      expect(isSubsumedBy(acme, { ...acme, caseNumber: null, hsCode: null })).toBe(false);
    });

    it("recognizes a record subsumed by a more complete fact", () => {
      expect(isSubsumedBy(acme, { ...acme, hsCode: null })).toBe(true);
      expect(isSubsumedBy(acme, { ...acme, hsCode: "7212.30.11" })).toBe(false);
    });

    it("collects only null to non-null fills", () => {
      const fact = { ...acme, tariffRate: 5.5 };
      const record = { ...acme, tariffRate: 9, basisLaw: "19 U.S.C. 1673" };
      expect(collectNullFills(fact, record)).toEqual({ basisLaw: "19 U.S.C. 1673" });
    });
  });

  describe("ReconciliationMerger", () => {
    let store: InMemoryFactStore;

    beforeEach(() => {
      store = new InMemoryFactStore();
    });

    it("inserts a record with a new identity", async () => {
      const merger = new ReconciliationMerger(store.session(), DOC);
      await expect(merger.merge(acme, CASE)).resolves.toBe("inserted");
      expect(store.facts).toHaveLength(1);
      expect(store.facts[0]).toMatchObject({ ...acme, id: 1, documentId: DOC });
      expect(merger.stats).toEqual({ inserted: 1, merged: 0, unchanged: 0, error: 0 });
      expect(merger.touchedGroups).toEqual([CASE]);
    });

    it("fills null fields and never overwrites a value", async () => {
      const merger = new ReconciliationMerger(store.session(), DOC);
      await merger.merge({ ...acme, tariffRate: 5.5 }, CASE);

      await expect(merger.merge({ ...acme, tariffRate: 12, effectiveDateFrom: "2023-01-05" }, CASE)).resolves.toBe(
        "merged",
      );
      await expect(merger.merge({ ...acme, tariffRate: 12 }, CASE)).resolves.toBe("unchanged");

      expect(store.facts).toHaveLength(1);
      expect(store.facts[0].tariffRate).toBe(5.5);
      expect(store.facts[0].effectiveDateFrom).toBe("2023-01-05");
      expect(store.updates).toEqual([{ factId: 1, patch: { effectiveDateFrom: "2023-01-05" } }]);
    });

    it("completes a fact whose code was unknown", async () => {
      const merger = new ReconciliationMerger(store.session(), DOC);
      await merger.merge({ ...acme, hsCode: null }, CASE);
      await expect(merger.merge(acme, CASE)).resolves.toBe("merged");
      expect(store.facts).toHaveLength(1);
      expect(store.facts[0].hsCode).toBe("7210.49.11");
    });

    it("matches exact identities only when refinement matching is off", async () => {
      const merger = new ReconciliationMerger(store.session(), DOC, { refinementMatch: false });
      await merger.merge({ ...acme, hsCode: null }, CASE);
      await expect(merger.merge(acme, CASE)).resolves.toBe("inserted");
      expect(store.facts.map((f) => f.hsCode)).toEqual([null, "7210.49.11"]);
    });

    it("leaves a more complete fact unchanged", async () => {
      const merger = new ReconciliationMerger(store.session(), DOC);
      await merger.merge(acme, CASE);
      await expect(merger.merge({ ...acme, hsCode: null }, CASE)).resolves.toBe("unchanged");
      expect(store.facts).toHaveLength(1);
    });

    it("keeps a country-wide rate apart from a named company", async () => {
      const merger = new ReconciliationMerger(store.session(), DOC);
      await expect(merger.merge({ ...acme, company: null, tariffRate: 10 }, CASE)).resolves.toBe("inserted");
      await expect(merger.merge({ ...acme, tariffRate: 5.5 }, CASE)).resolves.toBe("inserted");
      await expect(merger.merge({ ...acme, company: null, hsCode: null }, CASE)).resolves.toBe("unchanged");

      expect(store.facts.map((f) => [f.company, f.tariffRate])).toEqual([
        [null, 10],
        ["Acme", 5.5],
      ]);
      expect(store.updates).toEqual([]);
    });

    it("scopes matching to the owning document", async () => {
      await mergeRecord(store.session(), acme, "EU_2023_1.pdf", CASE);
      await expect(mergeRecord(store.session(), acme, DOC, CASE)).resolves.toBe("inserted");
      expect(store.facts.map((f) => f.documentId)).toEqual(["EU_2023_1.pdf", DOC]);
    });

    it("picks up facts persisted by an earlier run", async () => {
      await mergeRecord(store.session(), acme, DOC, CASE);
      const merger = new ReconciliationMerger(store.session(), DOC);
      await expect(merger.merge(acme, CASE)).resolves.toBe("unchanged");
    });

    describe("store rejections", () => {
      afterEach(() => {
        vi.restoreAllMocks();
      });

      it("reports a rejected insert as an error and keeps going", async () => {
        const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
        store.failWhen = (operation, detail) => operation === "insert" && detail.record?.company === "Bolt";
        const merger = new ReconciliationMerger(store.session(), DOC);

        await expect(merger.merge({ ...acme, company: "Bolt" }, CASE)).resolves.toBe("error");
        await expect(merger.merge(acme, CASE)).resolves.toBe("inserted");

        expect(merger.stats).toEqual({ inserted: 1, merged: 0, unchanged: 0, error: 1 });
        expect(errorSpy).toHaveBeenCalledTimes(1);
        expect(errorSpy.mock.calls[0][0]).toBe(`[Merger] Record rejected for document ${DOC} (constraint)`);
        expect(errorSpy.mock.calls[0][1]).toEqual({
          country: "South Korea",
          company: "Bolt",
          hsCode: "7210.49.11",
          caseNumber: CASE,
        });
      });

      it("reports a rejected update as an error", async () => {
        vi.spyOn(console, "error").mockImplementation(() => undefined);
        const merger = new ReconciliationMerger(store.session(), DOC);
        await merger.merge(acme, CASE);

        store.failWhen = (operation) => operation === "update";
        await expect(merger.merge({ ...acme, tariffRate: 5.5 }, CASE)).resolves.toBe("error");
        expect(store.facts[0].tariffRate).toBeNull();
      });
    });
  });
});
