import { randomUUID } from "node:crypto";

import { RagError, toRagError } from "../errors.ts";
import { debugRag, toOneLine } from "../log.ts";
import type { DocumentInput } from "../types.ts";
import type { Indexer } from "./ingestDocument.ts";

export type IngestJobState = "queued" | "running" | "done" | "failed";

export interface IngestJobStatus {
  jobId: string;
  state: IngestJobState;
  documentId: string;
  queuedAt: number;
  startedAt?: number;
  finishedAt?: number;
  result?: { chunksIndexed: number };
  error?: string;
}

export interface IngestQueueStats {
  /** Jobs whose document text is still held, waiting for the worker. */
  queued: number;
  /** Job statuses kept for polling, finished ones included. */
  tracked: number;
}

export interface IngestQueue {
  enqueue(input: DocumentInput): string;
  getJob(jobId: string): IngestJobStatus | null;
  /** Resolves once every job queued so far has finished. */
  drain(): Promise<void>;
  stats(): IngestQueueStats;
}

export interface IngestQueueOptions {
  now?: () => number;
  /** Finished statuses kept for polling; the oldest are evicted first. */
  maxFinishedJobs?: number;
}

const DEFAULT_MAX_FINISHED_JOBS = 1000;

export function createIngestQueue(indexer: Indexer, opts?: IngestQueueOptions): IngestQueue {
  const now = opts?.now ?? Date.now;
  const maxFinished = Math.max(1, Math.floor(opts?.maxFinishedJobs ?? DEFAULT_MAX_FINISHED_JOBS));
  const jobs = new Map<string, IngestJobStatus>();
  // Document text lives here only until its job starts.
  const pending = new Map<string, DocumentInput>();
  const finished: string[] = [];
  const queue: string[] = [];
  let worker: Promise<void> | null = null;

  function retire(jobId: string): void {
    finished.push(jobId);
    while (finished.length > maxFinished) {
      const evicted = finished.shift();
      if (evicted !== undefined) { jobs.delete(evicted); }
    }
  }

  async function runJob(job: IngestJobStatus, input: DocumentInput): Promise<void> {
    job.state = "running";
    job.startedAt = now();
    debugRag("rag.ingest.queue", "job_started", { jobId: job.jobId, documentId: job.documentId });

    try {
      const { chunksIndexed } = await indexer.indexDocument(input);
      job.state = "done";
      job.result = { chunksIndexed };
      debugRag("rag.ingest.queue", "job_done", { jobId: job.jobId, chunksIndexed });
    } catch (error: unknown) {
      // The indexer has already recorded the failure on the document.
      job.state = "failed";
      job.error = toOneLine(toRagError(error).message);
      debugRag("rag.ingest.queue", "job_failed", { jobId: job.jobId, error: job.error });
    } finally {
      job.finishedAt = now();
      retire(job.jobId);
    }
  }

  async function runWorker(): Promise<void> {
    let jobId = queue.shift();
    while (jobId !== undefined) {
      const job = jobs.get(jobId);
      const input = pending.get(jobId);
      pending.delete(jobId);
      if (job && input && job.state === "queued") { await runJob(job, input); }
      jobId = queue.shift();
    }
  }

  function ensureWorker(): void {
    if (worker) { return; }
    worker = runWorker().finally(() => {
      worker = null;
      if (queue.length) { ensureWorker(); }
    });
  }

  return {
    enqueue(input: DocumentInput): string {
      const documentId = String(input.id || "").trim();
      if (!documentId) { throw new RagError("invalid_input", "documentId is required"); }
      if (typeof input.rawText !== "string") { throw new RagError("invalid_input", "rawText must be a string"); }

      const jobId = randomUUID();
      jobs.set(jobId, {
        jobId,
        state: "queued",
        documentId,
        queuedAt: now(),
      });
      pending.set(jobId, { ...input, id: documentId });
      queue.push(jobId);

      // Start worker without blocking request path.
      ensureWorker();
      return jobId;
    },

    getJob(jobIdRaw: string): IngestJobStatus | null {
      const job = jobs.get(String(jobIdRaw || "").trim());
      if (!job) { return null; }

      return {
        jobId: job.jobId,
        state: job.state,
        documentId: job.documentId,
        queuedAt: job.queuedAt,
        ...(typeof job.startedAt === "number" ? { startedAt: job.startedAt } : {}),
        ...(typeof job.finishedAt === "number" ? { finishedAt: job.finishedAt } : {}),
        ...(job.result ? { result: { ...job.result } } : {}),
        ...(job.error ? { error: job.error } : {}),
      };
    },

    async drain(): Promise<void> {
      while (worker) { await worker; }
    },

    stats(): IngestQueueStats {
      return { queued: pending.size, tracked: jobs.size };
    },
  };
}
