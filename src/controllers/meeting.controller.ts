import type { Request, Response, NextFunction } from 'express';
import { getCompositionRoot } from '../app/composition-root';
import { ok } from '../utils/api-response';
import type { SubmitQuestionBody } from '../utils/validation.schemas';

/**
 * GET /api/v1/meetings/:meetingCode
 * Student view. `?studentId=` marks the questions that student has voted for.
 */
export async function getMeeting(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { meetingCode }: { meetingCode: string } = res.locals.params;
    const { studentId }: { studentId?: string } = res.locals.query;
    const view = await getCompositionRoot()
      .getQuestionService()
      .getStudentMeetingView(meetingCode, req.meetingAccess, studentId);
    ok(res, { meeting: view });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/meetings/:meetingCode/verify-password
 * Returns a meeting access token to send back as `X-Meeting-Token`.
 */
export async function verifyMeetingPassword(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { meetingCode }: { meetingCode: string } = res.locals.params;
    const { password }: { password: string } = req.body;
    const { token, expiresIn } = await getCompositionRoot().getMeetingAccessService().verifyPassword(meetingCode, password);
    ok(res, { meetingToken: token, expiresIn });
  } catch (error) {
    next(error);
  }
}

export async function submitQuestion(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { meetingCode }: { meetingCode: string } = res.locals.params;
    const body: SubmitQuestionBody = req.body;
    const receipt = await getCompositionRoot()
      .getQuestionService()
      .submitQuestion(meetingCode, { text: body.text, studentId: body.studentId }, req.meetingAccess);
    ok(res, receipt, 201);
  } catch (error) {
    next(error);
  }
}
