import { Router, type NextFunction, type Request, type Response } from 'express';
import { ValidationError } from '../errors';
import type { TaskService } from '../services/taskService';
import type { UpdateTaskInput } from '../types';
import { isRecord } from '../utils/guards';

function readTaskFields(body: unknown): UpdateTaskInput {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }

  const { title, description, completed } = body;
  const fields: UpdateTaskInput = {};

  if (title !== undefined) {
    if (typeof title !== 'string') throw new ValidationError('Title must be a string');
    fields.title = title;
  }
  if (description !== undefined) {
    if (description !== null && typeof description !== 'string') {
      throw new ValidationError('Description must be a string');
    }
    fields.description = typeof description === 'string' ? description : null;
  }
  if (completed !== undefined) {
    if (typeof completed !== 'boolean') throw new ValidationError('Completed must be a boolean');
    fields.completed = completed;
  }

  return fields;
}

export function createTaskRouter(taskService: TaskService): Router {
  const router = Router();

  // Get all tasks
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const tasks = await taskService.getAllTasks();
      res.json(tasks);
    } catch (error) {
      next(error);
    }
  });

  // Get single task
  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const task = await taskService.getTask(req.params.id);
      if (!task) {
        res.status(404).json({ error: 'Task not found' });
        return;
      }
      res.json(task);
    } catch (error) {
      next(error);
    }
  });

  // Create task
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { title, description, completed } = readTaskFields(req.body);

      if (!title) {
        res.status(400).json({ error: 'Title is required' });
        return;
      }

      const task = await taskService.createTask({ title, description, completed });
      res.status(201).json(task);
    } catch (error) {
      next(error);
    }
  });

  // Update task
  router.put('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const updates = readTaskFields(req.body);
      const updatedTask = await taskService.updateTask(req.params.id, updates);
      res.json(updatedTask);
    } catch (error) {
      next(error);
    }
  });

  // Delete task
  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await taskService.deleteTask(req.params.id);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
