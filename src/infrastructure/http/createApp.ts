import cors from 'cors';
import express, { type Response } from 'express';
import { ZodError } from 'zod';
import { PipelineRunRequestSchema, WindowQuerySchema } from '../../application/dto/PipelineRunDTO.js';
import {
  OperatorActionQuerySchema,
  RecommendationOverrideSchema,
  ToneCheckRequestSchema,
} from '../../application/dto/RecommendationOverrideDTO.js';
import { RecommendationNotFoundError, UserNotFoundError } from '../../domain/errors/RecommendationErrors.js';
import { checkTone } from '../../domain/services/recommendations/ToneGuardrail.js';
import type { AppContainer } from '../bootstrap/AppContainer.js';

export const API_NAME = 'Persona Signals API';
export const API_VERSION = '0.1.0';

const sendError = (res: Response, error: unknown, fallback: string) => {
  if (error instanceof ZodError) {
    return res.status(400).json({ error: 'Invalid request', issues: error.issues });
  }
  if (error instanceof RecommendationNotFoundError || error instanceof UserNotFoundError) {
    return res.status(404).json({ error: error.message, code: error.code });
  }

  const message = error instanceof Error ? error.message : fallback;
  console.error(`${fallback}:`, error);
  return res.status(500).json({ error: message });
};

export const createApp = (container: AppContainer) => {
  const app = express();

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: '2mb' }));

  app.get('/api/health', (req, res) => {
    res.json({
      name: API_NAME,
      version: API_VERSION,
      timeWindows: container.config.pipeline.timeWindows,
      catalog: {
        education: container.catalog.listEducation().length,
        partnerOffers: container.catalog.listOffers().length,
      },
    });
  });

  app.post('/api/pipeline/run', async (req, res) => {
    try {
      const request = PipelineRunRequestSchema.parse(req.body ?? {});
      const summary = await container.pipelineService.run(request);
      res.json(summary);
    } catch (error) {
      sendError(res, error, 'Pipeline run failed');
    }
  });

  app.get('/api/users/:userId/signals', async (req, res) => {
    try {
      const { window } = WindowQuerySchema.parse(req.query);
      const { userId } = req.params;
      const stored = await container.signalService.loadBundle(userId, window);

      if (!stored) {
        return res.status(404).json({ error: `No signals for ${userId} (${window})` });
      }

      res.json({ userId, timeWindow: window, computedAt: stored.computedAt, signals: stored.signals });
    } catch (error) {
      sendError(res, error, 'Unable to load signals');
    }
  });

  app.get('/api/users/:userId/persona', async (req, res) => {
    try {
      const { window } = WindowQuerySchema.parse(req.query);
      const { userId } = req.params;
      const assignment = await container.personaService.current(userId, window);

      if (!assignment) {
        return res.status(404).json({ error: `No persona assignment for ${userId} (${window})` });
      }

      res.json(assignment);
    } catch (error) {
      sendError(res, error, 'Unable to load persona');
    }
  });

  app.get('/api/users/:userId/recommendations', async (req, res) => {
    try {
      const { userId } = req.params;
      const recommendations = await container.storage.listRecommendations(userId);
      res.json({ userId, count: recommendations.length, recommendations });
    } catch (error) {
      sendError(res, error, 'Unable to load recommendations');
    }
  });

  app.post('/api/recommendations/:id/override', async (req, res) => {
    try {
      const override = RecommendationOverrideSchema.parse(req.body);
      const updated = await container.overrideService.override(req.params.id, override);
      res.json(updated);
    } catch (error) {
      sendError(res, error, 'Unable to override recommendation');
    }
  });

  app.get('/api/recommendations/:id/trace', async (req, res) => {
    try {
      res.json(await container.traceService.traceFor(req.params.id));
    } catch (error) {
      sendError(res, error, 'Unable to load decision trace');
    }
  });

  app.get('/api/users/:userId/timeline', async (req, res) => {
    try {
      const { userId } = req.params;
      const events = await container.traceService.timeline(userId);
      res.json({ userId, count: events.length, events });
    } catch (error) {
      sendError(res, error, 'Unable to load timeline');
    }
  });

  app.post('/api/users/:userId/flag', async (req, res) => {
    try {
      const flag = RecommendationOverrideSchema.parse(req.body);
      const action = await container.overrideService.flagUser(req.params.userId, flag);
      res.status(201).json(action);
    } catch (error) {
      sendError(res, error, 'Unable to flag user');
    }
  });

  app.get('/api/operator-actions', async (req, res) => {
    try {
      const { userId } = OperatorActionQuerySchema.parse(req.query);
      const actions = await container.overrideService.actions(userId);
      res.json({ count: actions.length, actions });
    } catch (error) {
      sendError(res, error, 'Unable to load operator actions');
    }
  });

  app.get('/api/evaluation', async (req, res) => {
    try {
      const { window } = WindowQuerySchema.parse(req.query);
      res.json(await container.evaluationService.evaluate(window));
    } catch (error) {
      sendError(res, error, 'Evaluation failed');
    }
  });

  app.get('/api/guardrails/incidents', async (req, res) => {
    try {
      const incidents = await container.storage.listGuardrailIncidents();
      res.json({ count: incidents.length, incidents });
    } catch (error) {
      sendError(res, error, 'Unable to load guardrail incidents');
    }
  });

  app.post('/api/guardrails/tone', (req, res) => {
    try {
      const { text } = ToneCheckRequestSchema.parse(req.body);
      res.json(checkTone(text));
    } catch (error) {
      sendError(res, error, 'Unable to check tone');
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found' });
  });

  return app;
};
