import type { NamespaceController, CallContext } from './namespace.controller';
import type { TaskMessage, TaskResult } from '../services/amqp';
import {
  createNamespaceRequestSchema,
  deleteNamespaceRequestSchema,
  getNamespaceRequestSchema,
  listNamespacesRequestSchema,
  namespaceStatsRequestSchema,
  parseRequest,
  updateNamespaceRequestSchema,
} from '../schemas/namespace';
import { ControllerError, ErrorCode, toControllerError } from '../lib/errors';
import logger from '../lib/logger';

const log = logger.child('tasks');

/**
 * Turns task messages into namespace controller calls and their outcome
 * into task results. Never throws: every failure becomes `ok: false`.
 */
export class TasksController {
  constructor(
    private readonly namespaces: NamespaceController,
    private readonly agentId: string
  ) {}

  async handle(task: TaskMessage): Promise<TaskResult> {
    const ctx: CallContext = task.deadlineMs !== undefined ? { deadlineMs: task.deadlineMs } : {};
    try {
      const result = await this.dispatch(task, ctx);
      return this.ok(task, result);
    } catch (err) {
      const error = toControllerError(err);
      log.warn('task failed', { taskId: task.taskId, action: task.action, code: error.code, message: error.message });
      return this.fail(task, error);
    }
  }

  private async dispatch(task: TaskMessage, ctx: CallContext): Promise<unknown> {
    const data = task.data ?? {};
    switch (task.action) {
      case 'namespace.create':
        return this.namespaces.create(parseRequest(createNamespaceRequestSchema, data), ctx);
      case 'namespace.delete':
        await this.namespaces.delete(parseRequest(deleteNamespaceRequestSchema, data), ctx);
        return {};
      case 'namespace.update':
        return this.namespaces.update(parseRequest(updateNamespaceRequestSchema, data));
      case 'namespace.list':
        return this.namespaces.list(parseRequest(listNamespacesRequestSchema, data), ctx);
      case 'namespace.get':
        return this.namespaces.get(parseRequest(getNamespaceRequestSchema, data), ctx);
      case 'namespace.stats':
        return this.namespaces.stats(parseRequest(namespaceStatsRequestSchema, data), ctx);
      default:
        throw new ControllerError(`Unknown action '${task.action}'`, ErrorCode.UNIMPLEMENTED);
    }
  }

  private ok(task: TaskMessage, result: unknown): TaskResult {
    return {
      taskId: task.taskId,
      agentId: this.agentId,
      ok: true,
      result,
      finishedAt: new Date().toISOString(),
    };
  }

  private fail(task: TaskMessage, error: ControllerError): TaskResult {
    return {
      taskId: task.taskId,
      agentId: this.agentId,
      ok: false,
      error: error.message,
      code: error.code,
      finishedAt: new Date().toISOString(),
    };
  }
}
