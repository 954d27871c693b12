import { Request, Response, NextFunction } from 'express';
import { AppError } from '../middleware/errorHandler';
import { KnowledgeBase, listCommonSymptoms } from '../services/knowledgeBase';
import { assessSymptoms } from '../services/assessmentService';
import { RuleEngineOptions } from '../services/ruleEngine';
import { SessionStore } from '../services/sessionStore';
import { DISALLOWED_IMAGE_MESSAGE, ImageStorage, isAllowedImage } from '../services/storageService';
import { AssessmentSubmissionInput } from '../utils/validation';
import { logAppEvent } from '../utils/logger';

export interface AssessmentControllerDeps {
  kb: KnowledgeBase;
  sessions: SessionStore;
  images: ImageStorage;
  engine?: RuleEngineOptions;
}

export function createAssessmentController({ kb, sessions, images, engine = {} }: AssessmentControllerDeps) {
  const listSymptoms = (req: Request, res: Response) => {
    res.json({ symptoms: listCommonSymptoms(kb) });
  };

  const submitAssessment = async (req: Request, res: Response, next: NextFunction) => {
    try {
      // Already validated and normalized by validateBody
      const form: AssessmentSubmissionInput = req.body;
      const warnings: string[] = [];

      let image: string | null = null;
      if (req.file && req.file.originalname !== '') {
        if (isAllowedImage(req.file.originalname)) {
          image = await images.save(req.file.buffer, req.file.originalname);
        } else {
          warnings.push(DISALLOWED_IMAGE_MESSAGE);
        }
      }

      const result = assessSymptoms(
        {
          text: form.symptoms_text,
          checked: form.symptoms_check,
          duration: form.duration,
          severity: form.severity,
          age: form.age,
          sex: form.sex,
          image,
        },
        kb,
        engine
      );

      await sessions.save(result);

      logAppEvent('Assessment created', {
        sessionId: result.sessionId,
        urgency: result.finalUrgency,
        imageStored: image !== null,
      });

      res.status(201).json({ sessionId: result.sessionId, result, warnings });
    } catch (error) {
      next(error);
    }
  };

  const getAssessment = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await sessions.get(req.params.sessionId);
      if (!result) {
        throw new AppError('Session not found', 404);
      }
      res.json(result);
    } catch (error) {
      next(error);
    }
  };

  const exportAssessment = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await sessions.get(req.params.sessionId);
      if (!result) {
        throw new AppError('Session not found', 404);
      }
      res.attachment(`report_${result.sessionId}.json`);
      res.type('application/json');
      res.send(JSON.stringify(result, null, 2));
    } catch (error) {
      next(error);
    }
  };

  return { listSymptoms, submitAssessment, getAssessment, exportAssessment };
}

export type AssessmentController = ReturnType<typeof createAssessmentController>;
