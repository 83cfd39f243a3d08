/**
 * Single-use capability that lets an unrelated later invocation resume one
 * parked workflow execution.
 */
export type ResumptionHandle = {
  token: string;
  expiresAt: Date;
};

export const isExpired = (handle: ResumptionHandle, now: Date): boolean =>
  handle.expiresAt.getTime() <= now.getTime();
