import crypto from "node:crypto";

export function sha256(input: string): string {
  return crypto.createHash("sha256").update(input, "utf8").digest("hex");
}

export function minutesSince(then: Date, now: Date): number {
  return (now.getTime() - then.getTime()) / 60_000;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
