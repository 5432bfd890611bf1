import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import multer from "multer";
import path from "path";
import { access, rm } from "fs/promises";
import type { AppConfig } from "./config/env";
import { describeError, httpStatusFor } from "./errors";
import { allowedUploadFormat, parseQuestionCount, secureFilename } from "./helper/uploads";
import type { McqPipeline } from "./pipeline/McqPipeline";
import { logger } from "./utils/logger";

export function createApp(config: AppConfig, pipeline: Pick<McqPipeline, "run">) {
  const app = express();
  app.use(cors());

  // Stored under a random name; the client's filename travels separately
  const upload = multer({
    dest: config.uploadDir,
    fileFilter: (_req, file, cb) =>
      cb(
        null,
        secureFilename(file.originalname) !== "" &&
          allowedUploadFormat(file.originalname, config.allowedFormats) !== undefined
      ),
  });

  app.get("/health-check", (_req, res) => res.send("ok"));

  // POST /generate
  // form-data: file=<pdf|txt|docx>, num_questions=<int>
  app.post("/generate", upload.single("file"), async (req, res) => {
    const file = req.file;
    if (!file) {
      return res.status(400).json({ error: "Upload a .pdf, .txt or .docx file" });
    }

    try {
      const sourceName = secureFilename(file.originalname);
      const format = allowedUploadFormat(sourceName, config.allowedFormats);
      const count = parseQuestionCount(req.body?.num_questions, config.maxQuestionCount);
      if (!format) {
        return res.status(400).json({ error: "Unsupported file type" });
      }
      if (count === undefined) {
        return res.status(400).json({
          error: `num_questions must be a whole number between 1 and ${config.maxQuestionCount}`,
        });
      }

      const result = await pipeline.run(file.path, format, count, sourceName);
      if (!result.ok) {
        return res
          .status(httpStatusFor(result.error))
          .json({ error: result.error.message, code: result.error.code });
      }

      const output = result.value;
      return res.json({
        mcqs: output.records,
        transcript: output.transcript,
        txt_filename: output.transcriptFilename,
        pdf_filename: output.documentFilename,
        requested: output.requestedCount,
        generated: output.records.length,
      });
    } catch (error) {
      logger.error({ error: describeError(error) }, "Error generating MCQs");
      return res.status(500).json({ error: "Failed to generate MCQs" });
    } finally {
      await rm(file.path, { force: true }).catch((error: unknown) =>
        logger.warn({ file: file.path, error: describeError(error) }, "Failed to remove upload")
      );
    }
  });

  app.get("/download/:filename", async (req, res) => {
    const { filename } = req.params;
    if (secureFilename(filename) !== filename) {
      return res.status(404).json({ error: "File not found" });
    }

    const filePath = path.join(config.resultsDir, filename);
    try {
      await access(filePath);
    } catch {
      return res.status(404).json({ error: "File not found" });
    }

    return res.download(filePath, filename, (error) => {
      if (error) logger.error({ filename, error: describeError(error) }, "Download failed");
    });
  });

  // multer and other middleware failures answer JSON like the routes do
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(error);
    logger.error({ error: describeError(error) }, "Request failed");
    if (error instanceof multer.MulterError) {
      return res.status(400).json({ error: error.message, code: error.code });
    }
    return res.status(500).json({ error: "Request failed", code: "INTERNAL_ERROR" });
  });

  return app;
}
