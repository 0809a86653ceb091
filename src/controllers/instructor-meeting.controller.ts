import type { Request, Response, NextFunction } from 'express';
import { getCompositionRoot } from '../app/composition-root';
import { requireAuth } from '../middleware/auth.middleware';
import { ok } from '../utils/api-response';
import { renderMeetingReportCsv, reportFilename } from '../services/report.service';

export async function getInstructorMeeting(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { instructorCode }: { instructorCode: string } = res.locals.params;
    const view = await getCompositionRoot().getQuestionService().getInstructorMeetingView(instructorCode, requireAuth(req));
    ok(res, { meeting: view });
  } catch (error) {
    next(error);
  }
}

export async function startMeeting(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { instructorCode }: { instructorCode: string } = res.locals.params;
    const meeting = await getCompositionRoot().getMeetingLifecycleService().startMeeting(instructorCode, requireAuth(req));
    ok(res, { meeting });
  } catch (error) {
    next(error);
  }
}

export async function endMeeting(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { instructorCode }: { instructorCode: string } = res.locals.params;
    const meeting = await getCompositionRoot().getMeetingLifecycleService().endMeeting(instructorCode, requireAuth(req));
    ok(res, { meeting });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/instructor/meetings/:instructorCode/restart
 * Reopens an ended meeting; numbering continues where it stopped.
 */
export async function restartMeeting(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { instructorCode }: { instructorCode: string } = res.locals.params;
    const meeting = await getCompositionRoot().getMeetingLifecycleService().restartMeeting(instructorCode, requireAuth(req));
    ok(res, { meeting });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/instructor/meetings/:instructorCode/reconcile-votes
 * Recomputes every cached upvote count from the vote rows.
 */
export async function reconcileVotes(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { instructorCode }: { instructorCode: string } = res.locals.params;
    const result = await getCompositionRoot().getVoteAggregatorService().reconcileVoteCounts(instructorCode, requireAuth(req));
    ok(res, result);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/instructor/meetings/:instructorCode/report?format=json|csv
 */
export async function getMeetingReport(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { instructorCode }: { instructorCode: string } = res.locals.params;
    const { format }: { format: 'json' | 'csv' } = res.locals.query;
    const report = await getCompositionRoot().getReportService().buildMeetingReport(instructorCode, requireAuth(req));
    if (format === 'csv') {
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${reportFilename(report.meeting.meeting_code)}"`);
      res.status(200).send(renderMeetingReportCsv(report));
      return;
    }
    ok(res, { report });
  } catch (error) {
    next(error);
  }
}
