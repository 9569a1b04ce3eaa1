import express from "express";
import cors from "cors";
import dotenv from "dotenv";

import { loadConfig } from "../config";
import { SubmissionService } from "../services/submissionService";
import { SubmissionEventStore } from "../stores/submissionEventStore";
import { SubmissionTrackingStore } from "../stores/submissionTrackingStore";
import { createSubmissionsRouter } from "./routes/submissions";

dotenv.config();

const config = loadConfig();
const app = express();

const submissions = new SubmissionService({
  queriesDir: config.queriesDir,
  expectedCount: config.expectedQuestionCount,
  studentIdPattern: config.studentIdPattern,
  tracking: new SubmissionTrackingStore(config.submissionsDataDir),
  events: new SubmissionEventStore(config.submissionsDataDir),
});

// Middleware
app.use(cors({
  origin: ["http://localhost:5173", "http://localhost:3000"],
}));
app.use(express.json({ limit: "1mb" }));

// Routes
app.use("/api/submissions", createSubmissionsRouter(submissions));

// Health check
app.get("/api/health", (req, res) => {
  res.json({ status: "ok", expectedQueries: config.expectedQuestionCount, timestamp: new Date().toISOString() });
});

// Start server
app.listen(config.apiPort, () => {
  console.log(`Submission API running on http://localhost:${config.apiPort}`);
});

export default app;
