import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { parseISO, isValid, subDays } from 'date-fns';
import {
  queryRecent,
  queryAllMatching,
  getJobById,
  getJobStats,
  updateJobStatus,
  getScrapeRuns,
  JOB_STATUSES,
} from '../db';
import type { Company } from '../registry';
import type { JobRecord } from '../scrapers/types';
import { classifyWorkType, isGreatFit, visaStatus, VISA_STATUS_LABELS, type VisaStatus, type WorkType } from '../scrapers/filters';
import { createLogger } from '../utils/logger';

const log = createLogger('API');

const statusUpdateSchema = z
  .object({
    status: z.enum(JOB_STATUSES).optional(),
    notes: z.string().max(5000).nullable().optional(),
  })
  .refine(body => body.status !== undefined || body.notes !== undefined, {
    message: 'status or notes is required',
  });

export interface JobView extends JobRecord {
  companyName: string;
  ethicsRating: string;
  visaStatus: VisaStatus;
  visaLabel: string;
  workType: WorkType;
  greatFit: boolean;
}

function toView(job: JobRecord, companies: Map<string, Company>): JobView {
  const company = companies.get(job.companyId);
  const visa = visaStatus(job, company?.knownVisaSponsor ?? false);
  return {
    ...job,
    companyName: company?.name ?? job.companyId,
    ethicsRating: company?.ethicsRating ?? 'neutral',
    visaStatus: visa,
    visaLabel: VISA_STATUS_LABELS[visa],
    workType: classifyWorkType(`${job.location ?? ''} ${job.title} ${job.description}`),
    greatFit: isGreatFit(job.title, job.description),
  };
}

export function createJobRoutes(companies: Map<string, Company>): Router {
  const router = Router();

  // GET /api/jobs/stats - must come before :id route
  router.get('/jobs/stats', (_req: Request, res: Response) => {
    try {
      const stats = getJobStats();
      res.json({ success: true, ...stats });
    } catch (error) {
      log.error('Stats error:', error);
      res.status(500).json({ success: false, error: 'Failed to get stats' });
    }
  });

  // GET /api/jobs/recent?since=ISO - defaults to the last 24 hours
  router.get('/jobs/recent', (req: Request, res: Response) => {
    try {
      const raw = req.query.since;
      let since = subDays(new Date(), 1);
      if (raw !== undefined) {
        const parsed = typeof raw === 'string' ? parseISO(raw) : new Date(NaN);
        if (!isValid(parsed)) {
          res.status(400).json({ success: false, error: 'since must be an ISO timestamp' });
          return;
        }
        since = parsed;
      }
      const jobs = queryRecent(since).map(job => toView(job, companies));
      res.json({ success: true, since: since.toISOString(), total: jobs.length, jobs });
    } catch (error) {
      log.error('Recent jobs error:', error);
      res.status(500).json({ success: false, error: 'Failed to list recent jobs' });
    }
  });

  // GET /api/jobs - every stored job in the target location
  router.get('/jobs', (_req: Request, res: Response) => {
    try {
      const jobs = queryAllMatching().map(job => toView(job, companies));
      res.json({ success: true, total: jobs.length, jobs });
    } catch (error) {
      log.error('Jobs list error:', error);
      res.status(500).json({ success: false, error: 'Failed to list jobs' });
    }
  });

  // GET /api/jobs/:id
  router.get('/jobs/:id', (req: Request, res: Response) => {
    try {
      const job = getJobById(req.params.id);
      if (!job) {
        res.status(404).json({ success: false, error: 'Job not found' });
        return;
      }
      res.json({ success: true, job: toView(job, companies) });
    } catch (error) {
      log.error('Job detail error:', error);
      res.status(500).json({ success: false, error: 'Failed to get job' });
    }
  });

  // PATCH /api/jobs/:id - human-entered status and notes
  router.patch('/jobs/:id', (req: Request, res: Response) => {
    const parsed = statusUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ success: false, error: parsed.error.issues[0]?.message ?? 'Invalid body' });
      return;
    }
    try {
      const job = updateJobStatus(req.params.id, parsed.data);
      if (!job) {
        res.status(404).json({ success: false, error: 'Job not found' });
        return;
      }
      res.json({ success: true, job: toView(job, companies) });
    } catch (error) {
      log.error('Status update error:', error);
      res.status(500).json({ success: false, error: 'Failed to update job' });
    }
  });

  // GET /api/scrape-runs - recent scrape history
  router.get('/scrape-runs', (req: Request, res: Response) => {
    try {
      const limit = typeof req.query.limit === 'string' ? Number(req.query.limit) : 20;
      const runs = getScrapeRuns(Number.isInteger(limit) && limit > 0 ? limit : 20);
      res.json({ success: true, runs });
    } catch (error) {
      log.error('Scrape runs error:', error);
      res.status(500).json({ success: false, error: 'Failed to get scrape runs' });
    }
  });

  return router;
}
