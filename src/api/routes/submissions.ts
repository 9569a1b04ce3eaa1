import { Request, Router } from "express";
import { z } from "zod";
import { ClientInfo, SubmissionService } from "../../services/submissionService";

const SubmissionBodySchema = z.object({
  fileName: z.string().min(1),
  content: z.string(),
});

function clientInfo(req: Request): ClientInfo {
  return {
    ip: req.ip ?? "unknown",
    host: req.get("host") ?? "unknown",
    userAgent: req.get("user-agent") ?? "unknown",
  };
}

export function createSubmissionsRouter(service: SubmissionService): Router {
  const router = Router();

  // POST /api/submissions/check - Run the format check without submitting
  router.post("/check", (req, res) => {
    const parsed = SubmissionBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: "fileName and content are required", details: parsed.error.flatten() });
    }

    const report = service.check(parsed.data.fileName, parsed.data.content);
    res.json(report);
  });

  // POST /api/submissions - Accept a file for grading
  router.post("/", (req, res) => {
    try {
      const parsed = SubmissionBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return res.status(400).json({ error: "fileName and content are required", details: parsed.error.flatten() });
      }

      const result = service.submit({
        fileName: parsed.data.fileName,
        content: parsed.data.content,
        client: clientInfo(req),
      });

      switch (result.status) {
        case "rejected":
          return res.status(400).json({
            error: result.report.fileNameValid
              ? "Formatting errors found. Fix your file and check again."
              : "Your file must be named as your Student ID (e.g., 2023A7PS0043H.sql).",
            report: result.report,
          });
        case "blocked":
          return res.status(409).json({ error: result.reason, studentId: result.studentId });
        default:
          return res.status(result.status === "submitted" ? 201 : 200).json({
            status: result.status,
            studentId: result.studentId,
          });
      }
    } catch (error) {
      console.error("Error saving submission:", error);
      res.status(500).json({ error: "Failed to save submission" });
    }
  });

  return router;
}
