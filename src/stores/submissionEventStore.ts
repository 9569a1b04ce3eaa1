import fs from "fs";
import path from "path";

export type SubmissionEventType = "SUBMIT" | "UPDATE" | "BLOCKED";

export interface SubmissionEvent {
  type: SubmissionEventType;
  studentId: string;
  ip: string;
  host: string;
  userAgent: string;
  detail: string;
  timestamp: Date;
}

const EVENTS_FILE = "submission_events.log";
const USER_AGENT_LIMIT = 60;

export function formatEvent(event: SubmissionEvent): string {
  return (
    `[${event.timestamp.toISOString()}] [${event.type}] ` +
    `ID: ${event.studentId} | IP: ${event.ip} | ` +
    `Host: ${event.host} | ` +
    `UA: ${event.userAgent.slice(0, USER_AGENT_LIMIT)}... | ` +
    `${event.detail}\n`
  );
}

/**
 * Append-only audit log of submission attempts, one line per event.
 */
export class SubmissionEventStore {
  private readonly filePath: string;

  constructor(dataDir: string) {
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
    this.filePath = path.join(dataDir, EVENTS_FILE);
  }

  append(event: SubmissionEvent): void {
    fs.appendFileSync(this.filePath, formatEvent(event), "utf-8");
  }
}
