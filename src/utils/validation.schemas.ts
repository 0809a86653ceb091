import { z } from 'zod';
import { MAX_QUESTION_LENGTH } from '../services/question.service';
import { MAX_ANSWER_LENGTH } from '../services/answer.service';
import { AUDIT_ACTIONS } from '../services/ports/audit-log.repository.port';

const usernameField = z
  .string()
  .trim()
  .min(3, 'Username must be at least 3 characters')
  .max(50, 'Username must be at most 50 characters')
  .regex(/^[a-zA-Z0-9_-]+$/, 'Username may only contain letters, digits, underscores and dashes');

const passwordField = z
  .string()
  .min(8, 'Password must be at least 8 characters')
  .max(100, 'Password must be at most 100 characters');

const emailField = z.string().trim().email().max(254);

const displayNameField = z.string().trim().min(1).max(100);

const idParam = z.coerce.number().int().positive();

// Meeting and instructor codes are base64url
const codeParam = z.string().trim().min(1).max(64).regex(/^[A-Za-z0-9_-]+$/, 'Invalid code');

// Auth schemas
export const registerSchema = z.object({
  username: usernameField,
  password: passwordField,
  email: emailField.nullish(),
  displayName: displayNameField.nullish(),
});

export const loginSchema = z.object({
  login: z.string().trim().min(1, 'Username or email is required'),
  password: z.string().min(1, 'Password is required'),
});

export const updateProfileSchema = z
  .object({
    displayName: displayNameField.nullish(),
    email: emailField.nullish(),
    currentPassword: z.string().min(1).optional(),
    newPassword: passwordField.optional(),
  })
  .refine((body) => body.newPassword === undefined || body.currentPassword !== undefined, {
    message: 'currentPassword is required to change the password',
    path: ['currentPassword'],
  });

export const createApiKeySchema = z.object({
  name: z.string().trim().min(1).max(100),
});

// Class schemas
export const createClassSchema = z.object({
  name: z.string().trim().min(1).max(200),
  description: z.string().trim().max(1000).nullish(),
});

export const updateClassSchema = z
  .object({
    name: z.string().trim().min(1).max(200).optional(),
    description: z.string().trim().max(1000).nullable().optional(),
  })
  .refine((body) => body.name !== undefined || body.description !== undefined, {
    message: 'At least one field must be provided',
  });

export const listClassesQuerySchema = z.object({
  includeArchived: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

// Meeting schemas
export const createMeetingSchema = z.object({
  title: z.string().trim().min(1).max(200),
  password: z.string().min(4).max(50).nullish(),
  startImmediately: z.boolean().optional(),
});

export const verifyMeetingPasswordSchema = z.object({
  password: z.string().min(1, 'Password is required').max(50),
});

export const studentViewQuerySchema = z.object({
  studentId: z.string().uuid().optional(),
});

export const reportQuerySchema = z.object({
  format: z.enum(['json', 'csv']).default('json'),
});

// Question schemas
export const submitQuestionSchema = z.object({
  text: z
    .string()
    .trim()
    .min(1, 'Question text is required')
    .max(MAX_QUESTION_LENGTH, `Question must be at most ${MAX_QUESTION_LENGTH} characters`),
  studentId: z.string().uuid().optional(),
});

export const voteSchema = z.object({
  studentId: z.string().uuid(),
});

export const saveAnswerSchema = z.object({
  answerText: z.string().trim().min(1).max(MAX_ANSWER_LENGTH),
  isApproved: z.boolean().default(false),
});

// Admin schemas
export const auditLogQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
  action: z.enum(AUDIT_ACTIONS).optional(),
  actorId: z.coerce.number().int().positive().optional(),
});

// Param schemas
export const classIdParamsSchema = z.object({ classId: idParam });
export const questionIdParamsSchema = z.object({ questionId: idParam });
export const keyIdParamsSchema = z.object({ keyId: idParam });
export const instructorIdParamsSchema = z.object({ id: idParam });
export const meetingCodeParamsSchema = z.object({ meetingCode: codeParam });
export const instructorCodeParamsSchema = z.object({ instructorCode: codeParam });

export type RegisterBody = z.infer<typeof registerSchema>;
export type LoginBody = z.infer<typeof loginSchema>;
export type UpdateProfileBody = z.infer<typeof updateProfileSchema>;
export type CreateClassBody = z.infer<typeof createClassSchema>;
export type UpdateClassBody = z.infer<typeof updateClassSchema>;
export type CreateMeetingBody = z.infer<typeof createMeetingSchema>;
export type SubmitQuestionBody = z.infer<typeof submitQuestionSchema>;
export type SaveAnswerBody = z.infer<typeof saveAnswerSchema>;
export type AuditLogQueryInput = z.infer<typeof auditLogQuerySchema>;
