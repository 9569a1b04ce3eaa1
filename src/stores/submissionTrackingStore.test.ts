import fs from "fs";
import path from "path";
import { SubmissionTrackingStore } from "./submissionTrackingStore";

// Mock fs module
jest.mock("fs");

const mockFs = jest.mocked(fs);
const trackingPath = path.join("data", "submissions_tracking.json");

describe("SubmissionTrackingStore", () => {
  let store: SubmissionTrackingStore;

  beforeEach(() => {
    jest.clearAllMocks();
    mockFs.existsSync.mockReturnValue(true);
    store = new SubmissionTrackingStore("data");
  });

  it("creates the data directory when missing", () => {
    mockFs.existsSync.mockReturnValue(false);

    new SubmissionTrackingStore("data");

    expect(mockFs.mkdirSync).toHaveBeenCalledWith("data", { recursive: true });
  });

  describe("load", () => {
    it("returns empty maps when no file exists", () => {
      mockFs.existsSync.mockReturnValue(false);

      expect(store.load()).toEqual({ ipToId: {}, idToIp: {} });
    });

    it("reads both maps from the file", () => {
      mockFs.readFileSync.mockReturnValue(
        JSON.stringify({ ipToId: { "10.0.0.5": "2023A7PS0001H" }, idToIp: { "2023A7PS0001H": "10.0.0.5" } })
      );

      expect(store.load()).toEqual({
        ipToId: { "10.0.0.5": "2023A7PS0001H" },
        idToIp: { "2023A7PS0001H": "10.0.0.5" },
      });
      expect(mockFs.readFileSync).toHaveBeenCalledWith(trackingPath, "utf-8");
    });

    it("fills in a missing map and drops non-string entries", () => {
      mockFs.readFileSync.mockReturnValue(JSON.stringify({ ipToId: { "10.0.0.5": "A", "10.0.0.6": 7 } }));

      expect(store.load()).toEqual({ ipToId: { "10.0.0.5": "A" }, idToIp: {} });
    });
  });

  describe("lookups", () => {
    beforeEach(() => {
      mockFs.readFileSync.mockReturnValue(
        JSON.stringify({ ipToId: { "10.0.0.5": "A" }, idToIp: { A: "10.0.0.5" } })
      );
    });

    it("finds the ID linked to an address", () => {
      expect(store.getIdForIp("10.0.0.5")).toBe("A");
      expect(store.getIdForIp("10.0.0.9")).toBeUndefined();
    });

    it("finds the address linked to an ID", () => {
      expect(store.getIpForId("A")).toBe("10.0.0.5");
      expect(store.getIpForId("B")).toBeUndefined();
    });
  });

  describe("link", () => {
    it("records the pair in both directions", () => {
      mockFs.existsSync.mockImplementation((p) => p !== trackingPath);

      store.link("10.0.0.5", "A");

      expect(mockFs.writeFileSync).toHaveBeenCalledWith(
        trackingPath,
        JSON.stringify({ ipToId: { "10.0.0.5": "A" }, idToIp: { A: "10.0.0.5" } }, null, 2)
      );
    });
  });
});
