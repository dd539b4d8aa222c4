import {
  DEFAULT_PAGE_SIZE,
  parseCreateTask,
  parseUpdateTask,
  parseTaskId,
  parseListQuery,
} from '@taskd/core';
import type { RouteRegisterFunction } from './types.js';
import { readJsonBody, sendJson, sendEmpty, sendFailure } from './respond.js';
import { toTaskResponse, toCreateTaskResponse } from './serializers.js';

export const tasksRegister: RouteRegisterFunction = (router, { service, logger }) => {
  const log = logger.child('tasks');

  router.add('POST', '/task', async ({ req, res }) => {
    const input = parseCreateTask(await readJsonBody(req));
    if (input.type !== 'success') return sendFailure(res, input);

    log.debug('create', input.data.title);
    const result = service.create(input.data);
    if (result.type !== 'success') return sendFailure(res, result);
    sendJson(res, 200, toCreateTaskResponse(result.data));
  });

  router.add('GET', '/task', ({ res, url }) => {
    const query = parseListQuery(url.searchParams, DEFAULT_PAGE_SIZE);
    log.debug('list', query.assignee, query.limit, query.offset);

    const result = service.list(query.assignee, query.limit, query.offset);
    if (result.type !== 'success') return sendFailure(res, result);
    sendJson(res, 200, result.data.map(toTaskResponse));
  });

  router.add('GET', '/task/:taskId', ({ res, params }) => {
    const taskId = parseTaskId(params['taskId'] ?? '');
    if (taskId.type !== 'success') return sendFailure(res, taskId);

    log.debug('get', taskId.data);
    const result = service.get(taskId.data);
    if (result.type !== 'success') return sendFailure(res, result);
    sendJson(res, 200, toTaskResponse(result.data));
  });

  router.add('PUT', '/task/:taskId', async ({ req, res, params }) => {
    const taskId = parseTaskId(params['taskId'] ?? '');
    if (taskId.type !== 'success') return sendFailure(res, taskId);
    const patch = parseUpdateTask(await readJsonBody(req));
    if (patch.type !== 'success') return sendFailure(res, patch);

    log.debug('update', taskId.data, Object.keys(patch.data));
    const result = service.update(taskId.data, patch.data);
    if (result.type !== 'success') return sendFailure(res, result);
    sendJson(res, 200, toTaskResponse(result.data));
  });

  router.add('DELETE', '/task/:taskId', ({ res, params }) => {
    const taskId = parseTaskId(params['taskId'] ?? '');
    if (taskId.type !== 'success') return sendFailure(res, taskId);

    log.debug('delete', taskId.data);
    const result = service.delete(taskId.data);
    if (result.type !== 'success') return sendFailure(res, result);
    sendEmpty(res, 204);
  });
};
