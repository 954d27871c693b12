import { Router } from 'express';
import multer from 'multer';
import { AssessmentController } from '../controllers/assessmentController';
import { assessmentSubmissionSchema, sessionParamSchema, validateBody, validateParams } from '../utils/validation';

export function createAssessmentRouter(controller: AssessmentController, maxUploadBytes: number): Router {
  const router = Router();

  // Optional image travels with the form; keep it in memory until accepted
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxUploadBytes,
      files: 1,
    },
  });

  router.post(
    '/',
    upload.single('image'),
    validateBody(assessmentSubmissionSchema),
    controller.submitAssessment
  );
  router.get('/:sessionId', validateParams(sessionParamSchema), controller.getAssessment);
  router.get('/:sessionId/export', validateParams(sessionParamSchema), controller.exportAssessment);

  return router;
}
