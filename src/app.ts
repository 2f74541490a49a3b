import os from 'os';
import { AmqpService, TaskMessage } from './services/amqp';
import { loadConfig } from './config';
import { EngineApi } from './services/engine-api';
import { NamespaceController } from './controllers/namespace.controller';
import { TasksController } from './controllers/tasks.controller';
import { InMemorySubsystemDirectory } from './stores/subsystems';
import { PaginationCursorStore } from './stores/pagination';
import logger from './lib/logger';

const config = loadConfig();
const pkg = require('../package.json') as { version?: string };

const amqp = new AmqpService(config.broker);
const engine = new EngineApi({
  baseUrl: config.engine.url,
  username: config.engine.user,
  password: config.engine.password,
  allowInsecureTls: config.engine.insecureTls,
  timeoutMs: config.engine.timeoutMs,
});
const subsystems = new InMemorySubsystemDirectory(config.subsystems);

const namespaceController = new NamespaceController({
  engine,
  subsystems,
  cursors: new PaginationCursorStore({
    defaultPageSize: config.pagination.defaultPageSize,
    maxPageSize: config.pagination.maxPageSize,
    ttlMs: config.pagination.cursorTtlMs,
    maxCursors: config.pagination.maxCursors,
  }),
  controllerId: config.engine.controllerId,
  bdevType: config.engine.bdevType,
  engineTimeoutMs: config.engine.timeoutMs,
});
const tasksController = new TasksController(namespaceController, config.broker.service.agentId);

async function start(): Promise<void> {
  logger.info('starting', {
    service: config.broker.service.name,
    engine: config.engine.url,
    subsystems: subsystems.names(),
  });

  await amqp.init();

  await amqp.consumeTasks(async (task: TaskMessage) => {
    logger.info('task received', { taskId: task.taskId, action: task.action });
    return tasksController.handle(task);
  });

  const heartbeatPayload = () => ({
    agentId: config.broker.service.agentId,
    version: pkg.version ?? 'unknown',
    capabilities: ['nvme-namespace'],
    host: os.hostname(),
    ts: new Date().toISOString(),
  });

  amqp.publishHeartbeat(heartbeatPayload());

  const heartbeatTimer = setInterval(() => {
    try {
      amqp.publishHeartbeat(heartbeatPayload());
    } catch (err) {
      logger.error('Failed to publish heartbeat', { err });
    }
  }, config.broker.telemetry.heartbeatIntervalMs);

  const shutdown = async () => {
    clearInterval(heartbeatTimer);
    await amqp.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      logger.error('shutdown failed', { err });
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

start().catch((err) => {
  logger.error('fatal start-up error', { err });
  process.exit(1);
});
