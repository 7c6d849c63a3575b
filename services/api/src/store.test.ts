import { describe, expect, it } from "vitest";
import { createTestRegistry } from "./__fixtures__/registry";
import { ActivityFullError, ActivityNotFoundError, AlreadySignedUpError, NotRegisteredError } from "./errors";
import { ActivityStore } from "./store";

describe("ActivityStore", () => {
  describe("list", () => {
    it("should return every seeded activity with its details", () => {
      const store = new ActivityStore(createTestRegistry());

      expect(store.list()).toEqual(createTestRegistry());
      expect(store.size()).toBe(3);
    });

    it("should return a snapshot that does not alias the store", () => {
      const store = new ActivityStore(createTestRegistry());

      store.list().Basketball?.participants.push("intruder@mergington.edu");

      expect(store.get("Basketball")?.participants).toEqual(["alex@mergington.edu"]);
    });

    it("should copy the seed on construction", () => {
      const seed = createTestRegistry();
      const store = new ActivityStore(seed);

      seed.Basketball?.participants.push("late@mergington.edu");

      expect(store.get("Basketball")?.participants).toEqual(["alex@mergington.edu"]);
    });
  });

  describe("get", () => {
    it("should return null for an unknown activity", () => {
      const store = new ActivityStore(createTestRegistry());

      expect(store.get("Underwater Basket Weaving")).toBeNull();
    });
  });

  describe("signup", () => {
    it("should append the email in insertion order", async () => {
      const store = new ActivityStore(createTestRegistry());

      await expect(store.signup("Basketball", "new@x.edu")).resolves.toBe("Signed up new@x.edu for Basketball");

      expect(store.get("Basketball")?.participants).toEqual(["alex@mergington.edu", "new@x.edu"]);
    });

    it("should reject a duplicate email and leave participants unchanged", async () => {
      const store = new ActivityStore(createTestRegistry());

      await expect(store.signup("Basketball", "alex@mergington.edu")).rejects.toBeInstanceOf(AlreadySignedUpError);

      expect(store.get("Basketball")?.participants).toEqual(["alex@mergington.edu"]);
    });

    it("should reject an unknown activity without mutating anything", async () => {
      const store = new ActivityStore(createTestRegistry());

      await expect(store.signup("Chess Club", "new@x.edu")).rejects.toBeInstanceOf(ActivityNotFoundError);

      expect(store.list()).toEqual(createTestRegistry());
    });

    it("should reject a signup once the activity is at capacity", async () => {
      const seed = createTestRegistry();
      seed["Solo Recital"] = {
        description: "One performer per term",
        schedule: "Fridays, 6:00 PM - 7:00 PM",
        max_participants: 1,
        participants: ["mia@mergington.edu"]
      };
      const store = new ActivityStore(seed);

      await expect(store.signup("Solo Recital", "new@x.edu")).rejects.toThrow("Activity is full");
      await expect(store.signup("Solo Recital", "new@x.edu")).rejects.toBeInstanceOf(ActivityFullError);

      expect(store.get("Solo Recital")?.participants).toEqual(["mia@mergington.edu"]);
    });

    it("should let exactly one of two concurrent identical signups through", async () => {
      const store = new ActivityStore(createTestRegistry());

      const results = await Promise.allSettled([
        store.signup("Tennis Club", "twin@mergington.edu"),
        store.signup("Tennis Club", "twin@mergington.edu")
      ]);

      expect(results.map((result) => result.status)).toEqual(["fulfilled", "rejected"]);
      expect(store.get("Tennis Club")?.participants).toEqual(["lucas@mergington.edu", "twin@mergington.edu"]);
    });
  });

  describe("unregister", () => {
    it("should remove a present email", async () => {
      const store = new ActivityStore(createTestRegistry());

      await expect(store.unregister("Drama Club", "isabella@mergington.edu")).resolves.toBe(
        "Unregistered isabella@mergington.edu from Drama Club"
      );

      expect(store.get("Drama Club")?.participants).toEqual(["noah@mergington.edu"]);
    });

    it("should reject an absent email without mutating anything", async () => {
      const store = new ActivityStore(createTestRegistry());

      await expect(store.unregister("Drama Club", "ghost@mergington.edu")).rejects.toBeInstanceOf(NotRegisteredError);

      expect(store.get("Drama Club")?.participants).toEqual(["isabella@mergington.edu", "noah@mergington.edu"]);
    });

    it("should reject an unknown activity", async () => {
      const store = new ActivityStore(createTestRegistry());

      await expect(store.unregister("Chess Club", "alex@mergington.edu")).rejects.toThrow("Activity not found");
    });

    it("should restore participants after signup then unregister", async () => {
      const store = new ActivityStore(createTestRegistry());

      await store.signup("Tennis Club", "roundtrip@mergington.edu");
      await store.unregister("Tennis Club", "roundtrip@mergington.edu");

      expect(store.get("Tennis Club")?.participants).toEqual(["lucas@mergington.edu"]);
    });

    it("should follow the signup then unregister example", async () => {
      const store = new ActivityStore(createTestRegistry());

      await store.signup("Basketball", "new@x.edu");
      expect(store.get("Basketball")?.participants).toEqual(["alex@mergington.edu", "new@x.edu"]);

      await store.unregister("Basketball", "alex@mergington.edu");
      expect(store.get("Basketball")?.participants).toEqual(["new@x.edu"]);
    });
  });
});
