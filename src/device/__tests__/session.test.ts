/**
 * Session state tests - token swaps under the write lock.
 */
import { describe, expect, it } from "vitest";

import { SessionState } from "../session.js";

describe("SessionState", () => {
  it("returns the token it replaced", async () => {
    const state = new SessionState({ authToken: "first", settingsRoot: "tv" });

    const previous = await state.setAuthToken("second");

    expect(previous).toBe("first");
    expect(state.current()).toEqual({ authToken: "second", settingsRoot: "tv" });
  });

  it("restores the previous token while the expected one is current", async () => {
    const state = new SessionState({ authToken: "first", settingsRoot: "tv" });
    const previous = await state.setAuthToken("second");

    const restored = await state.restoreAuthToken("second", previous);

    expect(restored).toBe(true);
    expect(state.current().authToken).toBe("first");
  });

  it("leaves a newer token in place", async () => {
    const state = new SessionState({ authToken: undefined, settingsRoot: "tv" });
    const previous = await state.setAuthToken("second");
    await state.setAuthToken("third");

    const restored = await state.restoreAuthToken("second", previous);

    expect(restored).toBe(false);
    expect(state.current().authToken).toBe("third");
  });

  it("serialises concurrent writers", async () => {
    const state = new SessionState({ authToken: undefined, settingsRoot: "tv" });

    const previous = await Promise.all([
      state.setAuthToken("a"),
      state.setAuthToken("b"),
      state.setSettingsRoot("audio"),
    ]);

    expect(previous.slice(0, 2)).toEqual([undefined, "a"]);
    expect(state.current()).toEqual({ authToken: "b", settingsRoot: "audio" });
  });
});
