import express, { Request, Response } from 'express'
import type { BatchCoordinator } from '../services/batchCoordinator'
import { asyncHandler } from '../middleware/errorHandler'

export function createBatchRoutes(batches: BatchCoordinator): express.Router {
  const router = express.Router()

  /** POST /: { requests: [...] }; all or nothing, 400 when oversize or any request is invalid */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const submitted = await batches.submitBatch(req.body, { userId: req.apiKeyUser?.userId })
      res.status(201).json(submitted)
    })
  )

  /** GET /:batchId: status and counts derived from the child tasks */
  router.get(
    '/:batchId',
    asyncHandler(async (req: Request, res: Response) => {
      const view = await batches.getBatch(req.params.batchId, { userId: req.apiKeyUser?.userId })
      res.set({ 'Cache-Control': 'no-store' }).json(view)
    })
  )

  return router
}
