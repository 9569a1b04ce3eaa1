import fs from "fs";
import path from "path";

export interface SubmissionTracking {
  ipToId: Record<string, string>;
  idToIp: Record<string, string>;
}

const TRACKING_FILE = "submissions_tracking.json";

/**
 * SubmissionTrackingStore remembers which client address submitted which
 * student ID, in both directions, in a single JSON file.
 */
export class SubmissionTrackingStore {
  private readonly filePath: string;

  constructor(dataDir: string) {
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
    this.filePath = path.join(dataDir, TRACKING_FILE);
  }

  load(): SubmissionTracking {
    if (!fs.existsSync(this.filePath)) {
      return { ipToId: {}, idToIp: {} };
    }
    const data: unknown = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    return toTracking(data);
  }

  save(tracking: SubmissionTracking): void {
    fs.writeFileSync(this.filePath, JSON.stringify(tracking, null, 2));
  }

  getIdForIp(ip: string): string | undefined {
    return this.load().ipToId[ip];
  }

  getIpForId(studentId: string): string | undefined {
    return this.load().idToIp[studentId];
  }

  /**
   * Link an address and a student ID to each other.
   */
  link(ip: string, studentId: string): void {
    const tracking = this.load();
    tracking.ipToId[ip] = studentId;
    tracking.idToIp[studentId] = ip;
    this.save(tracking);
  }
}

// Older files, or hand-edited ones, may be missing either map.
function toTracking(data: unknown): SubmissionTracking {
  if (typeof data !== "object" || data === null) {
    return { ipToId: {}, idToIp: {} };
  }
  const ipToId = "ipToId" in data ? toStringRecord(data.ipToId) : {};
  const idToIp = "idToIp" in data ? toStringRecord(data.idToIp) : {};
  return { ipToId, idToIp };
}

function toStringRecord(value: unknown): Record<string, string> {
  if (typeof value !== "object" || value === null) {
    return {};
  }
  const record: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") {
      record[key] = entry;
    }
  }
  return record;
}
