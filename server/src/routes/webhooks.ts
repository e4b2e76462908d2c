import express, { Request, Response } from 'express'
import type { WebhookNotifier } from '../workers/webhookNotifier'
import { asyncHandler } from '../middleware/errorHandler'

export function createWebhookRoutes(notifier: WebhookNotifier): express.Router {
  const router = express.Router()

  /** GET /stats: delivery counts across all tasks, plus how many tasks the notifier is tracking */
  router.get(
    '/stats',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json({ ...(await notifier.stats()), trackedTasks: notifier.trackedTasks() })
    })
  )

  return router
}
