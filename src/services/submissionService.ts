import crypto from "crypto";
import fs from "fs";
import path from "path";
import { FormatCheckReport, checkSubmissionFormat } from "../domain/formatChecker";
import { SubmissionEventStore, SubmissionEventType } from "../stores/submissionEventStore";
import { SubmissionTrackingStore } from "../stores/submissionTrackingStore";

export interface ClientInfo {
  ip: string;
  host: string;
  userAgent: string;
}

export interface SubmissionRequest {
  fileName: string;
  content: string;
  client: ClientInfo;
}

export type SubmissionResult =
  | { status: "rejected"; report: FormatCheckReport }
  | { status: "blocked"; studentId: string; reason: string }
  | { status: "submitted" | "updated"; studentId: string; savedTo: string; contentHash: string };

export interface SubmissionServiceOptions {
  queriesDir: string;
  expectedCount: number;
  studentIdPattern: RegExp;
  tracking: SubmissionTrackingStore;
  events: SubmissionEventStore;
  now?: () => Date;
}

/** Short fingerprint of a file, enough to spot a changed resubmission. */
export function contentHash(content: string): string {
  return crypto.createHash("md5").update(content).digest("hex").slice(0, 8);
}

/**
 * SubmissionService accepts student files into the grader's input
 * directory. A file must pass the format check, and each client address
 * may only ever submit for one student ID (and each ID from one address).
 */
export class SubmissionService {
  constructor(private readonly options: SubmissionServiceOptions) {}

  check(fileName: string, content: string): FormatCheckReport {
    return checkSubmissionFormat(fileName, content, {
      expectedCount: this.options.expectedCount,
      studentIdPattern: this.options.studentIdPattern,
    });
  }

  submit(request: SubmissionRequest): SubmissionResult {
    const report = this.check(request.fileName, request.content);
    if (!report.passed || report.studentId === null) {
      return { status: "rejected", report };
    }

    const studentId = report.studentId;
    const { ip } = request.client;
    const { tracking } = this.options;

    const idForIp = tracking.getIdForIp(ip);
    if (idForIp !== undefined && idForIp !== studentId) {
      const reason = `You have already submitted for Student ID ${idForIp}. You cannot submit for a different ID.`;
      this.log("BLOCKED", studentId, request.client, `Reason: IP already linked to ${idForIp}`);
      return { status: "blocked", studentId, reason };
    }

    const ipForId = tracking.getIpForId(studentId);
    if (ipForId !== undefined && ipForId !== ip) {
      const reason =
        `Student ID ${studentId} has already been submitted from a different IP address. ` +
        "If this is an error, contact the instructor.";
      this.log("BLOCKED", studentId, request.client, `Reason: ID already claimed by IP ${ipForId}`);
      return { status: "blocked", studentId, reason };
    }

    const isUpdate = idForIp === studentId;
    if (!fs.existsSync(this.options.queriesDir)) {
      fs.mkdirSync(this.options.queriesDir, { recursive: true });
    }
    const savedTo = path.join(this.options.queriesDir, `${studentId}.sql`);
    fs.writeFileSync(savedTo, request.content, "utf-8");
    tracking.link(ip, studentId);

    const hash = contentHash(request.content);
    this.log(isUpdate ? "UPDATE" : "SUBMIT", studentId, request.client, `Hash: ${hash} | File: ${report.fileName}`);

    return { status: isUpdate ? "updated" : "submitted", studentId, savedTo, contentHash: hash };
  }

  private log(type: SubmissionEventType, studentId: string, client: ClientInfo, detail: string): void {
    this.options.events.append({
      type,
      studentId,
      ip: client.ip,
      host: client.host,
      userAgent: client.userAgent,
      detail,
      timestamp: this.options.now ? this.options.now() : new Date(),
    });
  }
}
