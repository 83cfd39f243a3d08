export type TerminalJobStatus = "Completed" | "Failed" | "Stopped";

export type JobStatus = TerminalJobStatus | "InProgress" | "Stopping" | "Unknown";

const knownStatuses: readonly JobStatus[] = ["Completed", "Failed", "Stopped", "InProgress", "Stopping"];

export const normalizeJobStatus = (raw: unknown): JobStatus => {
  if (typeof raw !== "string") return "Unknown";
  const trimmed = raw.trim().toLowerCase();
  return knownStatuses.find((status) => status.toLowerCase() === trimmed) ?? "Unknown";
};

/** Anything other than `Completed` is handled as a failed job. */
export const isSuccessfulJob = (status: JobStatus): status is "Completed" => status === "Completed";
