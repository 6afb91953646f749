/**
 * Device Module - Session State
 *
 * Auth token and settings root of one connected device. Writers queue
 * on a mutex that guards only the assignment; readers take the current
 * snapshot without waiting. No lock is ever held across a request.
 */
import { Mutex } from "async-mutex";

export type SessionSnapshot = Readonly<{
  authToken: string | undefined;
  settingsRoot: string;
}>;

export class SessionState {
  private snapshot: SessionSnapshot;
  private readonly writeLock = new Mutex();

  constructor(initial: SessionSnapshot) {
    this.snapshot = initial;
  }

  current(): SessionSnapshot {
    return this.snapshot;
  }

  /**
   * Replace the auth token, returning the one it replaced.
   */
  setAuthToken(authToken: string | undefined): Promise<string | undefined> {
    return this.writeLock.runExclusive(() => {
      const previous = this.snapshot.authToken;
      this.snapshot = { ...this.snapshot, authToken };
      return previous;
    });
  }

  /**
   * Put `previous` back, but only while `expected` is still the current
   * token. Returns whether the token was restored.
   */
  restoreAuthToken(
    expected: string | undefined,
    previous: string | undefined,
  ): Promise<boolean> {
    return this.writeLock.runExclusive(() => {
      if (this.snapshot.authToken !== expected) {
        return false;
      }
      this.snapshot = { ...this.snapshot, authToken: previous };
      return true;
    });
  }

  setSettingsRoot(settingsRoot: string): Promise<void> {
    return this.writeLock.runExclusive(() => {
      this.snapshot = { ...this.snapshot, settingsRoot };
    });
  }
}
