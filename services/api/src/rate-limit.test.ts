import { describe, expect, it } from "vitest";
import { FixedWindowRateLimiter } from "./rate-limit";

describe("FixedWindowRateLimiter", () => {
  it("should allow up to the budget within one window", () => {
    const limiter = new FixedWindowRateLimiter(1000, 2);

    expect(limiter.take("public:10.0.0.1", 0)).toBe(true);
    expect(limiter.take("public:10.0.0.1", 10)).toBe(true);
    expect(limiter.take("public:10.0.0.1", 20)).toBe(false);
    expect(limiter.take("public:10.0.0.2", 20)).toBe(true);
  });

  it("should open a fresh window once the old one expires", () => {
    const limiter = new FixedWindowRateLimiter(1000, 1);

    expect(limiter.take("public:10.0.0.1", 0)).toBe(true);
    expect(limiter.take("public:10.0.0.1", 999)).toBe(false);
    expect(limiter.take("public:10.0.0.1", 1000)).toBe(true);
  });

  it("should drop expired buckets of other clients", () => {
    const limiter = new FixedWindowRateLimiter(1000, 5);

    limiter.take("public:10.0.0.1", 0);
    limiter.take("public:10.0.0.2", 100);
    expect(limiter.size()).toBe(2);

    limiter.take("public:10.0.0.3", 1500);

    expect(limiter.size()).toBe(1);
  });
});
