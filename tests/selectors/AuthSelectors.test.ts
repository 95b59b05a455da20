/**
 * AuthSelectors Test
 */

import { describe, it, expect } from "@jest/globals";
import { isSignedInGreeting } from "@/selectors/AuthSelectors";

describe("isSignedInGreeting", () => {
  it.each(["Hello, Sam", "Hi, Sam", "Hello Sam"])("accepts %p", (greeting) => {
    expect(isSignedInGreeting(greeting)).toBe(true);
  });

  it.each(["Hello, sign in", "Hello, Sign In", "Hi, signin", "Account & Lists", ""])(
    "rejects %p",
    (greeting) => {
      expect(isSignedInGreeting(greeting)).toBe(false);
    },
  );
});
