/**
 * Input Validation with Zod
 * Provides type-safe validation for all API inputs
 */

import { z } from 'zod';
import { Request, Response, NextFunction } from 'express';

// ==================== Assessment Schemas ====================

// Form fields arrive as strings; absent ones become ''
const formText = (max: number) => z.string().trim().max(max).optional().default('');

// A single checkbox posts a string, several post an array
const checkedSymptoms = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => {
    if (value === undefined) return [];
    const list = Array.isArray(value) ? value : [value];
    return list.map((s) => s.trim()).filter((s) => s.length > 0);
  })
  .pipe(z.array(z.string().max(200)).max(100, 'Too many selected symptoms'));

export const assessmentSubmissionSchema = z.object({
  symptoms_text: z.string().max(5000, 'Description too long (max 5000 characters)').optional().default(''),
  symptoms_check: checkedSymptoms,
  duration: formText(100),
  severity: formText(50),
  age: z
    .union([
      z.number().int().min(0).max(150).transform(String),
      z.string().trim().regex(/^(\d{1,3})?$/, 'Age must be a whole number'),
    ])
    .optional()
    .default(''),
  sex: formText(50),
});

export const sessionParamSchema = z.object({
  sessionId: z.string().regex(/^[0-9a-f]{32}$/, 'Invalid session ID'),
});

// ==================== Validation Middleware ====================

function validationDetails(error: z.ZodError) {
  return error.issues.map((e: z.ZodIssue) => ({
    field: e.path.join('.'),
    message: e.message,
  }));
}

/**
 * Creates an Express middleware that validates request body
 */
export function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body ?? {});
    if (!result.success) {
      return res.status(400).json({
        error: 'Validation failed',
        details: validationDetails(result.error),
      });
    }
    req.body = result.data;
    next();
  };
}

/**
 * Creates an Express middleware that validates request params
 */
export function validateParams<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.params);
    if (!result.success) {
      return res.status(400).json({
        error: 'Invalid URL parameters',
        details: validationDetails(result.error),
      });
    }
    next();
  };
}

export type AssessmentSubmissionInput = z.infer<typeof assessmentSubmissionSchema>;
