import express, { type ErrorRequestHandler } from "express";
import { CreateJobSchema, ListJobsQuerySchema } from "./dto/job.dto.js";
import { JobFailedError, type JobService } from "./services/job.service.js";

function validationMessage(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

export function createApp(jobService: JobService): express.Express {
  const app = express();
  app.use(express.json());

  app.get("/", (_req, res) => {
    res.json({ message: "Page digest worker", status: "running" });
  });

  app.post("/scrape", (req, res) => {
    const parsed = CreateJobSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: validationMessage(parsed.error.issues) });
      return;
    }

    try {
      res.status(202).json(jobService.createJob(parsed.data));
    } catch (error) {
      console.error("Failed to create job:", error);
      res.status(500).json({ error: "Failed to create job" });
    }
  });

  app.post("/scrape/sync", async (req, res) => {
    const parsed = CreateJobSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: validationMessage(parsed.error.issues) });
      return;
    }

    try {
      res.json(await jobService.scrapeSync(parsed.data));
    } catch (error) {
      if (error instanceof JobFailedError) {
        res.status(500).json({ error: `Scraping failed: ${error.message}` });
        return;
      }
      console.error("Failed to run job:", error);
      res.status(500).json({ error: "Failed to run job" });
    }
  });

  app.get("/jobs", (req, res) => {
    const parsed = ListJobsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: validationMessage(parsed.error.issues) });
      return;
    }

    res.json(jobService.listJobs(parsed.data));
  });

  app.get("/jobs/:id", (req, res) => {
    const job = jobService.getJob(req.params.id);

    if (!job) {
      res.status(404).json({ error: "Job not found" });
      return;
    }

    res.json(job);
  });

  app.get("/jobs/:id/result", (req, res) => {
    const lookup = jobService.getJobResult(req.params.id);

    switch (lookup.kind) {
      case "not_found":
        res.status(404).json({ error: "Job not found" });
        return;
      case "not_ready":
        res
          .status(425)
          .json({ error: `Job is still ${lookup.status}. Please wait for completion.` });
        return;
      case "failed":
        res.status(500).json({ error: `Job failed: ${lookup.error}` });
        return;
      case "ready":
        res.json(lookup.result);
        return;
    }
  });

  app.delete("/jobs/:id", async (req, res) => {
    try {
      const deleted = await jobService.deleteJob(req.params.id);
      if (!deleted) {
        res.status(404).json({ error: "Job not found" });
        return;
      }
      res.json({ message: "Job deleted successfully", jobId: req.params.id });
    } catch (error) {
      console.error("Failed to delete job:", error);
      res.status(500).json({ error: "Failed to delete job" });
    }
  });

  const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    // express.json() hands malformed bodies here with a 400 status attached.
    const status =
      typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
        ? err.status
        : 500;
    if (status >= 500) console.error("Unhandled request error:", err);
    res.status(status).json({ error: status < 500 ? "Invalid request body" : "Internal server error" });
  };
  app.use(errorHandler);

  return app;
}
