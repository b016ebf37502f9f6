import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { DbClient } from '../db/db-adapter.js';
import {
  getContributorDetail,
  getEntityDetail,
  getGlobalTimeline,
  getInStateShare,
  getOrganizationDetail,
  getOutOfStateSummary,
  getOverviewStats,
  getReportDetail,
  getReportTimeline,
  getStateContributions,
  getTopContributors,
  getTopRecipients,
  isReportSort,
  listContributors,
  listOrganizations,
  listRecipients,
  listReports,
  search,
  type ReportSort,
} from '../db/queries.js';
import { getCandidateDetail, getCandidateInStateShare, listCandidates } from '../db/candidate-queries.js';
import { getLobbyistDetail, getLobbyistReportDetail, listLobbyistReports, listLobbyists } from '../db/lobbyist-queries.js';
import { ValidationError } from '../errors.js';

// Helper
const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) =>
  (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };

function stringQuery(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/** Positive integer query parameter. */
function intQuery(req: Request, name: string): number | undefined {
  const value = stringQuery(req, name);
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new ValidationError(`Query parameter "${name}" must be a positive integer`);
  }
  return Number(value);
}

function sortQuery(req: Request): ReportSort | undefined {
  const value = stringQuery(req, 'sort');
  if (value === undefined) return undefined;
  if (!isReportSort(value)) {
    throw new ValidationError(`Unknown sort "${value}"`);
  }
  return value;
}

/** Two-letter state code from a path or query value. */
function stateCode(value: string, name: string): string {
  if (!/^[A-Za-z]{2}$/.test(value)) {
    throw new ValidationError(`${name} must be a two-letter state code`);
  }
  return value.toUpperCase();
}

function homeStateQuery(req: Request): string | undefined {
  const value = stringQuery(req, 'home_state');
  return value === undefined ? undefined : stateCode(value, 'Query parameter "home_state"');
}

function notFound(res: Response, what: string) {
  return res.status(404).json({ error: `${what} not found` });
}

export function createApp(db: DbClient) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.get('/api/health', asyncHandler(async (req, res) => {
    await db.query('SELECT 1');
    res.json({ status: 'ok', database: db.kind });
  }));

  app.get('/api/stats', asyncHandler(async (req, res) => {
    res.json(await getOverviewStats(db, { year: intQuery(req, 'year') }));
  }));

  // --- Reports ---

  app.get('/api/reports', asyncHandler(async (req, res) => {
    res.json(await listReports(db, {
      page: intQuery(req, 'page'),
      pageSize: intQuery(req, 'page_size'),
      year: intQuery(req, 'year'),
      organizationType: stringQuery(req, 'org_type'),
      search: stringQuery(req, 'search'),
      sort: sortQuery(req),
    }));
  }));

  app.get('/api/reports/:reportId', asyncHandler(async (req, res) => {
    const detail = await getReportDetail(db, req.params.reportId);
    detail ? res.json(detail) : notFound(res, 'Report');
  }));

  app.get('/api/reports/:reportId/timeline', asyncHandler(async (req, res) => {
    const timeline = await getReportTimeline(db, req.params.reportId);
    timeline ? res.json(timeline) : notFound(res, 'Report');
  }));

  app.get('/api/reports/:reportId/top-contributors', asyncHandler(async (req, res) => {
    const top = await getTopContributors(db, req.params.reportId, intQuery(req, 'limit'));
    top ? res.json(top) : notFound(res, 'Report');
  }));

  app.get('/api/reports/:reportId/top-expenditures', asyncHandler(async (req, res) => {
    const top = await getTopRecipients(db, req.params.reportId, intQuery(req, 'limit'));
    top ? res.json(top) : notFound(res, 'Report');
  }));

  // --- Contributors and organizations ---

  app.get('/api/contributors', asyncHandler(async (req, res) => {
    res.json(await listContributors(db, {
      page: intQuery(req, 'page'),
      pageSize: intQuery(req, 'page_size'),
      year: intQuery(req, 'year'),
      search: stringQuery(req, 'search'),
    }));
  }));

  app.get('/api/contributors/:name', asyncHandler(async (req, res) => {
    const detail = await getContributorDetail(db, req.params.name);
    detail ? res.json(detail) : notFound(res, 'Contributor');
  }));

  app.get('/api/expenditures', asyncHandler(async (req, res) => {
    res.json(await listRecipients(db, {
      page: intQuery(req, 'page'),
      pageSize: intQuery(req, 'page_size'),
      year: intQuery(req, 'year'),
      search: stringQuery(req, 'search'),
    }));
  }));

  app.get('/api/organizations', asyncHandler(async (req, res) => {
    res.json(await listOrganizations(db, {
      page: intQuery(req, 'page'),
      pageSize: intQuery(req, 'page_size'),
      year: intQuery(req, 'year'),
      organizationType: stringQuery(req, 'org_type'),
      search: stringQuery(req, 'search'),
    }));
  }));

  app.get('/api/organizations/:name', asyncHandler(async (req, res) => {
    const detail = await getOrganizationDetail(db, req.params.name, { year: intQuery(req, 'year') });
    detail ? res.json(detail) : notFound(res, 'Organization');
  }));

  app.get('/api/organizations/:name/in-state', asyncHandler(async (req, res) => {
    const share = await getInStateShare(db, req.params.name, {
      year: intQuery(req, 'year'),
      homeState: homeStateQuery(req),
    });
    share ? res.json(share) : notFound(res, 'Organization');
  }));

  // --- Candidates ---

  app.get('/api/candidates', asyncHandler(async (req, res) => {
    res.json(await listCandidates(db, {
      page: intQuery(req, 'page'),
      pageSize: intQuery(req, 'page_size'),
      year: intQuery(req, 'year'),
      search: stringQuery(req, 'search'),
    }));
  }));

  app.get('/api/candidates/:name', asyncHandler(async (req, res) => {
    const detail = await getCandidateDetail(db, req.params.name, { year: intQuery(req, 'year') });
    detail ? res.json(detail) : notFound(res, 'Candidate');
  }));

  app.get('/api/candidates/:name/in-state', asyncHandler(async (req, res) => {
    const share = await getCandidateInStateShare(db, req.params.name, {
      year: intQuery(req, 'year'),
      homeState: homeStateQuery(req),
    });
    share ? res.json(share) : notFound(res, 'Candidate');
  }));

  // --- Lobbyists ---

  app.get('/api/lobbyist-reports', asyncHandler(async (req, res) => {
    res.json(await listLobbyistReports(db, {
      page: intQuery(req, 'page'),
      pageSize: intQuery(req, 'page_size'),
      year: intQuery(req, 'year'),
      search: stringQuery(req, 'search'),
    }));
  }));

  app.get('/api/lobbyist-reports/:reportId', asyncHandler(async (req, res) => {
    const detail = await getLobbyistReportDetail(db, req.params.reportId);
    detail ? res.json(detail) : notFound(res, 'Lobbyist report');
  }));

  app.get('/api/lobbyists', asyncHandler(async (req, res) => {
    res.json(await listLobbyists(db, {
      page: intQuery(req, 'page'),
      pageSize: intQuery(req, 'page_size'),
      search: stringQuery(req, 'search'),
    }));
  }));

  app.get('/api/lobbyists/:entityId', asyncHandler(async (req, res) => {
    const detail = await getLobbyistDetail(db, req.params.entityId);
    detail ? res.json(detail) : notFound(res, 'Lobbyist');
  }));

  // --- Global views ---

  app.get('/api/global/timeline', asyncHandler(async (req, res) => {
    res.json(await getGlobalTimeline(db));
  }));

  app.get('/api/out-of-state', asyncHandler(async (req, res) => {
    res.json(await getOutOfStateSummary(db, { year: intQuery(req, 'year') }));
  }));

  app.get('/api/out-of-state/:state', asyncHandler(async (req, res) => {
    const state = stateCode(req.params.state, 'State');
    res.json(await getStateContributions(db, state, { year: intQuery(req, 'year') }));
  }));

  app.get('/api/search', asyncHandler(async (req, res) => {
    const q = stringQuery(req, 'q');
    if (!q) {
      return res.status(400).json({ error: 'Query parameter "q" is required' });
    }
    res.json(await search(db, q));
  }));

  app.get('/api/entities/:entityId', asyncHandler(async (req, res) => {
    const entity = await getEntityDetail(db, req.params.entityId);
    entity ? res.json(entity) : notFound(res, 'Entity');
  }));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handling middleware
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ValidationError) {
      return res.status(400).json({ error: err.message });
    }
    console.error('Error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
