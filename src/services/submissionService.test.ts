import fs from "fs";
import path from "path";
import { DEFAULT_STUDENT_ID_PATTERN } from "../domain/formatChecker";
import { SubmissionEventStore } from "../stores/submissionEventStore";
import { SubmissionTrackingStore } from "../stores/submissionTrackingStore";
import { ClientInfo, SubmissionService, contentHash } from "./submissionService";

jest.mock("fs");
jest.mock("../stores/submissionTrackingStore");
jest.mock("../stores/submissionEventStore");

const mockFs = jest.mocked(fs);

const ANSWERS = "--1--\nSELECT 1;\n--2--\nSELECT 2;\n";
const client: ClientInfo = { ip: "10.0.0.5", host: "lab-pc-12", userAgent: "Mozilla/5.0" };
const timestamp = new Date("2026-03-02T09:15:00.000Z");

describe("SubmissionService", () => {
  const tracking = jest.mocked(new SubmissionTrackingStore("data"));
  const events = jest.mocked(new SubmissionEventStore("data"));
  const service = new SubmissionService({
    queriesDir: "queries",
    expectedCount: 2,
    studentIdPattern: DEFAULT_STUDENT_ID_PATTERN,
    tracking,
    events,
    now: () => timestamp,
  });

  beforeEach(() => {
    // reset, not clear: lookups stubbed by one test must not leak into the next
    jest.resetAllMocks();
    mockFs.existsSync.mockReturnValue(true);
  });

  it("fingerprints content with the first eight hex digits of its MD5", () => {
    expect(contentHash("hello")).toBe("5d41402a");
  });

  it("saves a first submission and links the address", () => {
    const result = service.submit({ fileName: "2023a7ps0001h.sql", content: ANSWERS, client });

    const savedTo = path.join("queries", "2023A7PS0001H.sql");
    expect(result).toEqual({
      status: "submitted",
      studentId: "2023A7PS0001H",
      savedTo,
      contentHash: "faf7d344",
    });
    expect(mockFs.writeFileSync).toHaveBeenCalledWith(savedTo, ANSWERS, "utf-8");
    expect(tracking.link).toHaveBeenCalledWith("10.0.0.5", "2023A7PS0001H");
    expect(events.append).toHaveBeenCalledWith({
      type: "SUBMIT",
      studentId: "2023A7PS0001H",
      ip: "10.0.0.5",
      host: "lab-pc-12",
      userAgent: "Mozilla/5.0",
      detail: "Hash: faf7d344 | File: 2023a7ps0001h.sql",
      timestamp,
    });
  });

  it("treats a resubmission from the same address as an update", () => {
    tracking.getIdForIp.mockReturnValue("2023A7PS0001H");
    tracking.getIpForId.mockReturnValue("10.0.0.5");

    const result = service.submit({ fileName: "2023A7PS0001H.sql", content: ANSWERS, client });

    expect(result.status).toBe("updated");
    expect(events.append).toHaveBeenCalledWith(expect.objectContaining({ type: "UPDATE" }));
  });

  it("creates the queries directory when missing", () => {
    mockFs.existsSync.mockReturnValue(false);

    service.submit({ fileName: "2023A7PS0001H.sql", content: ANSWERS, client });

    expect(mockFs.mkdirSync).toHaveBeenCalledWith("queries", { recursive: true });
  });

  it("blocks an address that already submitted for another ID", () => {
    tracking.getIdForIp.mockReturnValue("2023B1PS0002H");

    const result = service.submit({ fileName: "2023A7PS0001H.sql", content: ANSWERS, client });

    expect(result).toEqual({
      status: "blocked",
      studentId: "2023A7PS0001H",
      reason: "You have already submitted for Student ID 2023B1PS0002H. You cannot submit for a different ID.",
    });
    expect(mockFs.writeFileSync).not.toHaveBeenCalled();
    expect(tracking.link).not.toHaveBeenCalled();
    expect(events.append).toHaveBeenCalledWith(
      expect.objectContaining({ type: "BLOCKED", detail: "Reason: IP already linked to 2023B1PS0002H" })
    );
  });

  it("blocks an ID already submitted from another address", () => {
    tracking.getIpForId.mockReturnValue("10.0.0.9");

    const result = service.submit({ fileName: "2023A7PS0001H.sql", content: ANSWERS, client });

    expect(result).toEqual({
      status: "blocked",
      studentId: "2023A7PS0001H",
      reason:
        "Student ID 2023A7PS0001H has already been submitted from a different IP address. " +
        "If this is an error, contact the instructor.",
    });
    expect(events.append).toHaveBeenCalledWith(
      expect.objectContaining({ type: "BLOCKED", detail: "Reason: ID already claimed by IP 10.0.0.9" })
    );
  });

  it("rejects a badly named file without touching the stores", () => {
    const result = service.submit({ fileName: "answers.sql", content: ANSWERS, client });

    expect(result.status).toBe("rejected");
    expect(tracking.getIdForIp).not.toHaveBeenCalled();
    expect(events.append).not.toHaveBeenCalled();
  });

  it("rejects a file with a missing marker", () => {
    const result = service.submit({ fileName: "2023A7PS0001H.sql", content: "--1--\nSELECT 1;", client });

    expect(result).toEqual({
      status: "rejected",
      report: {
        fileName: "2023A7PS0001H.sql",
        fileNameValid: true,
        studentId: "2023A7PS0001H",
        questions: [
          { index: 1, status: "PASS", message: "Correctly formatted." },
          { index: 2, status: "FAIL", message: "Marker --2-- is missing." },
        ],
        fileError: null,
        passed: false,
      },
    });
  });

  it("accepts a file whose queries only draw warnings", () => {
    const result = service.submit({ fileName: "2023A7PS0001H.sql", content: "--1--\nSELECT 1\n--2--\nSELECT 2", client });

    expect(result.status).toBe("submitted");
  });
});
