import express, { Request, Response } from 'express'
import type { TaskService } from '../services/taskService'
import { asyncHandler } from '../middleware/errorHandler'

const NO_STORE = { 'Cache-Control': 'no-store, no-cache, must-revalidate', 'Pragma': 'no-cache', 'Expires': '0' }

export function createTaskRoutes(tasks: TaskService): express.Router {
  const router = express.Router()
  const caller = (req: Request) => ({ userId: req.apiKeyUser?.userId })

  /** POST /: validate and enqueue; 201 { taskId, status: 'queued' } */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const created = await tasks.createTask(req.body, caller(req))
      res.status(201).json(created)
    })
  )

  /** GET /: filter by status (comma list), type, priority, provider, batchId; limit/offset */
  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await tasks.listTasks(req.query, caller(req)))
    })
  )

  router.get(
    '/stats',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(await tasks.statistics())
    })
  )

  /** GET /:taskId: status, progress, queue position and webhook summary. Never cached: clients poll it. */
  router.get(
    '/:taskId',
    asyncHandler(async (req: Request, res: Response) => {
      const status = await tasks.getStatus(req.params.taskId, caller(req))
      res.set(NO_STORE).json(status)
    })
  )

  router.get(
    '/:taskId/events',
    asyncHandler(async (req: Request, res: Response) => {
      const events = await tasks.events(req.params.taskId, caller(req))
      res.json({ taskId: req.params.taskId, events })
    })
  )

  router.get(
    '/:taskId/webhooks',
    asyncHandler(async (req: Request, res: Response) => {
      const deliveries = await tasks.webhookDeliveries(req.params.taskId, caller(req))
      res.json({
        taskId: req.params.taskId,
        deliveries: deliveries.map(({ body: _body, ...rest }) => rest),
      })
    })
  )

  /** POST /:taskId/cancel: 'cancelled' or 'cancelling'; 409 once completed or failed */
  router.post(
    '/:taskId/cancel',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await tasks.cancel(req.params.taskId, caller(req)))
    })
  )

  /** POST /:taskId/retry: failed tasks only; 409 otherwise */
  router.post(
    '/:taskId/retry',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await tasks.retry(req.params.taskId, caller(req)))
    })
  )

  return router
}
