import { describe, it, expect, beforeEach } from 'vitest';
import type { TaskRepository } from '../../src/db/repository.js';
import { EngineRejected, EngineUnreachable, InvalidTransition, NotFound, ValidationError } from '../../src/errors.js';
import { TaskController } from '../../src/services/task-controller.js';
import { FakeEngine, gidFor } from '../helpers/fake-engine.js';
import {
  createTestStore,
  flushAsync,
  INFO_HASH,
  infoHashFor,
  MAGNET,
  magnetFor,
  makeTorrent,
} from '../helpers/fixtures.js';

const GID1 = gidFor(1);
const GID2 = gidFor(2);

describe('TaskController', () => {
  let store: TaskRepository;
  let engine: FakeEngine;
  let requested: string[];
  let controller: TaskController;

  beforeEach(() => {
    store = createTestStore();
    engine = new FakeEngine();
    requested = [];
    controller = new TaskController(
      store,
      engine,
      { requestTask: (id: string) => { requested.push(id); } },
      { maxTorrentSize: 1024 * 1024 }
    );
  });

  describe('add', () => {
    it('submits a magnet and tracks the engine job', async () => {
      const { task } = await controller.add({ magnet: MAGNET });

      expect(task).toMatchObject({
        name: 'Test File',
        infoHash: INFO_HASH,
        status: 'downloading',
        desiredState: 'active',
        engineJobId: GID1,
      });
      expect(task.id).toMatch(/^[0-9a-f]{40}$/);
      expect(engine.submitted).toEqual([{ kind: 'magnet', uri: MAGNET }]);
      expect(requested).toEqual([task.id]);
    });

    it('names the task after the torrent file', async () => {
      const { task } = await controller.add({ torrent: makeTorrent('ubuntu.iso') });
      expect(task.name).toBe('ubuntu.iso');
      expect(task.infoHash).toBeNull();
      expect(task.source.kind).toBe('torrent');
    });

    it('prefers an explicit name and falls back to the id', async () => {
      const { task: named } = await controller.add({ magnet: MAGNET, name: '  Custom  ' });
      expect(named.name).toBe('Custom');

      const { task: unnamed } = await controller.add({ magnet: `magnet:?xt=urn:btih:${infoHashFor(7)}` });
      expect(unnamed.name).toBe(`Download_${unnamed.id.slice(0, 8)}`);
    });

    it('can add a task paused', async () => {
      const { task } = await controller.add({ magnet: MAGNET, paused: true });
      expect(task).toMatchObject({ status: 'paused', desiredState: 'paused', engineJobId: GID1 });
      expect(engine.jobs.get(GID1)?.status).toBe('paused');
    });

    it('stores nothing for an invalid payload', async () => {
      await expect(controller.add({})).rejects.toThrow(ValidationError);
      await expect(controller.add({ magnet: 'magnet:?dn=nothing' })).rejects.toThrow('Not a valid magnet URI');
      expect(store.list()).toEqual([]);
      expect(engine.calls).toEqual([]);
    });

    it('records an engine rejection on the task', async () => {
      engine.rejectSubmit = 'Invalid URI';
      const { task } = await controller.add({ magnet: MAGNET });

      expect(task).toMatchObject({
        status: 'error',
        errorMessage: 'aria2.addUri: Invalid URI',
        engineJobId: null,
      });
      expect(requested).toEqual([]);
    });

    it('returns the existing task when the torrent is already tracked', async () => {
      const first = await controller.add({ magnet: MAGNET });
      const again = await controller.add({ magnet: `magnet:?xt=urn:btih:${INFO_HASH}&dn=Other+Name` });

      expect(first.created).toBe(true);
      expect(again).toEqual({ task: first.task, created: false });
      expect(store.list()).toHaveLength(1);
      expect(engine.callsTo('submit')).toHaveLength(1);
    });

    it('retries the submission when a tracked torrent never reached the engine', async () => {
      engine.unreachable = true;
      await controller.add({ magnet: MAGNET }).catch(() => undefined);
      engine.unreachable = false;

      const { task, created } = await controller.add({ magnet: MAGNET });

      expect(created).toBe(false);
      expect(task).toMatchObject({ status: 'downloading', engineJobId: GID1 });
      expect(store.list()).toHaveLength(1);
    });

    it('adds a deleted torrent again as a new task', async () => {
      const { task: first } = await controller.add({ magnet: MAGNET });
      await controller.delete(first.id);

      const { task, created } = await controller.add({ magnet: MAGNET });

      expect(created).toBe(true);
      expect(task.id).not.toBe(first.id);
      expect(task).toMatchObject({ status: 'downloading', engineJobId: GID2 });
    });

    it('keeps the task queued while the engine is unreachable', async () => {
      engine.unreachable = true;
      const error = await controller.add({ magnet: MAGNET }).catch((e: unknown) => e);

      const [task] = store.list();
      expect(error).toBeInstanceOf(EngineUnreachable);
      expect(error).toMatchObject({ taskId: task.id });
      expect(task).toMatchObject({ status: 'queued', engineJobId: null });
    });
  });

  describe('submitPending', () => {
    it('submits queued tasks once the engine is back', async () => {
      engine.unreachable = true;
      await controller.add({ magnet: magnetFor(1) }).catch(() => undefined);
      await controller.add({ magnet: magnetFor(2) }).catch(() => undefined);

      await expect(controller.submitPending()).resolves.toBe(0);
      expect(store.listByStatus('queued')).toHaveLength(2);

      engine.unreachable = false;
      await expect(controller.submitPending()).resolves.toBe(2);
      expect(store.list().map((t) => [t.status, t.engineJobId])).toEqual([
        ['downloading', GID1],
        ['downloading', GID2],
      ]);
    });
  });

  describe('pause and resume', () => {
    it('pauses and resumes a downloading task', async () => {
      const { task } = await controller.add({ magnet: MAGNET });

      const paused = await controller.pause(task.id);
      expect(paused).toMatchObject({ id: task.id, status: 'paused', desiredState: 'paused', engineJobId: GID1 });
      expect(engine.callsTo('pause')).toEqual([{ method: 'pause', gid: GID1 }]);

      const resumed = await controller.resume(task.id);
      expect(resumed).toMatchObject({ id: task.id, status: 'downloading', desiredState: 'active' });
      expect(engine.jobs.get(GID1)?.status).toBe('active');
      expect(requested).toEqual([task.id, task.id, task.id]);
    });

    it('refuses to resume a task that never reached the engine', async () => {
      store.create({
        id: 'c'.repeat(40),
        name: 'never submitted',
        source: { kind: 'magnet', uri: MAGNET },
        infoHash: null,
        status: 'paused',
      });

      await expect(controller.resume('c'.repeat(40))).rejects.toThrow('Task has not been submitted to the engine');
      expect(engine.callsTo('resume')).toEqual([]);
    });

    it('rejects transitions the state machine does not allow', async () => {
      const { task } = await controller.add({ magnet: MAGNET });

      await expect(controller.resume(task.id)).rejects.toThrow('Cannot resume a downloading task');
      await controller.pause(task.id);
      await expect(controller.pause(task.id)).rejects.toThrow('Task is already paused');

      store.update(task.id, { status: 'completed' });
      await expect(controller.pause(task.id)).rejects.toThrow(InvalidTransition);
      await expect(controller.pause(task.id)).rejects.toThrow('Cannot pause a completed task');
      expect(engine.callsTo('pause')).toHaveLength(1);
    });

    it('surfaces an engine refusal without touching the task', async () => {
      const { task } = await controller.add({ magnet: MAGNET });
      engine.setJob(GID1, { status: 'complete' });

      const error = await controller.pause(task.id).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EngineRejected);
      expect(error).toMatchObject({ taskId: task.id });
      expect(store.require(task.id)).toMatchObject({ status: 'downloading', desiredState: 'active' });
    });

    it('reports unknown tasks', async () => {
      await expect(controller.pause('f'.repeat(40))).rejects.toThrow(NotFound);
    });
  });

  describe('delete', () => {
    it('removes the engine job and keeps the record', async () => {
      const { task } = await controller.add({ magnet: MAGNET });

      const removed = await controller.delete(task.id);

      expect(removed).toMatchObject({ id: task.id, status: 'removed', desiredState: 'removed', engineJobId: null });
      expect(engine.callsTo('remove')).toEqual([{ method: 'remove', gid: GID1 }]);
      expect(engine.jobs.get(GID1)?.status).toBe('removed');
      expect(store.list()).toHaveLength(1);
    });

    it('treats deleting a removed task as a no-op', async () => {
      const { task } = await controller.add({ magnet: MAGNET });
      await controller.delete(task.id);
      const callCount = engine.calls.length;

      const again = await controller.delete(task.id);

      expect(again.status).toBe('removed');
      expect(engine.calls).toHaveLength(callCount);
    });

    it('drops the stored result of a completed job', async () => {
      const { task } = await controller.add({ magnet: MAGNET });
      engine.setJob(GID1, { status: 'complete' });
      store.update(task.id, { status: 'completed', progress: 100 });

      await controller.delete(task.id);

      expect(engine.callsTo('remove')).toEqual([]);
      expect(engine.callsTo('forgetResult')).toEqual([{ method: 'forgetResult', gid: GID1 }]);
      expect(engine.jobs.has(GID1)).toBe(false);
    });

    it('succeeds when the engine has already lost the job', async () => {
      const { task } = await controller.add({ magnet: MAGNET });
      engine.jobs.delete(GID1);

      await expect(controller.delete(task.id)).resolves.toMatchObject({ status: 'removed' });
      expect(engine.callsTo('forgetResult')).toHaveLength(1);
    });

    it('deletes a task that never reached the engine without calling it', async () => {
      engine.unreachable = true;
      await controller.add({ magnet: MAGNET }).catch(() => undefined);
      const [task] = store.list();
      const callCount = engine.calls.length;

      await expect(controller.delete(task.id)).resolves.toMatchObject({ status: 'removed' });
      expect(engine.calls).toHaveLength(callCount);
    });

    it('leaves the task deletable when the engine is unreachable', async () => {
      const { task } = await controller.add({ magnet: MAGNET });
      engine.unreachable = true;

      const error = await controller.delete(task.id).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(EngineUnreachable);
      expect(error).toMatchObject({ taskId: task.id });
      expect(store.require(task.id)).toMatchObject({ status: 'downloading', engineJobId: GID1 });

      engine.unreachable = false;
      await expect(controller.delete(task.id)).resolves.toMatchObject({ status: 'removed' });
    });
  });

  describe('concurrent intents', () => {
    it('runs a delete only after a pending pause has settled', async () => {
      const { task } = await controller.add({ magnet: MAGNET });
      const release = engine.hold();

      const pausing = controller.pause(task.id);
      const deleting = controller.delete(task.id);
      await flushAsync();

      expect(engine.callsTo('pause')).toHaveLength(1);
      expect(engine.callsTo('remove')).toHaveLength(0);

      release();
      await expect(pausing).resolves.toMatchObject({ status: 'paused' });
      await expect(deleting).resolves.toMatchObject({ status: 'removed' });
      expect(engine.maxInFlightPerJob).toBe(1);
      expect(store.require(task.id).status).toBe('removed');
    });

    it('refuses a pause queued behind a delete', async () => {
      const { task } = await controller.add({ magnet: MAGNET });
      const release = engine.hold();

      const deleting = controller.delete(task.id);
      const pausing = controller.pause(task.id).catch((e: unknown) => e);
      await flushAsync();
      release();

      await expect(deleting).resolves.toMatchObject({ status: 'removed' });
      const error = await pausing;
      expect(error).toBeInstanceOf(InvalidTransition);
      expect(error).toMatchObject({ message: 'Cannot pause a removed task' });
      expect(engine.callsTo('pause')).toEqual([]);
      expect(engine.maxInFlightPerJob).toBe(1);
    });
  });
});
