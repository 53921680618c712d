/* eslint-env mocha */
/* global describe, it, beforeEach */
import { expect } from 'chai';
import sinon from 'sinon';
import { API_PREFIX, createApiHandler, createRoutes, matchPath } from '../../../src/server/routes';
import type { ApiReply, ApiRequest } from '../../../src/server/types';
import { FactsIngestService, LinkValidationService, TopologyService } from '../../../src/services';
import { TopologyStore } from '../../../src/shared/io/TopologyStore';
import { KeyedLock } from '../../../src/shared/utilities/KeyedLock';
import { MemoryFsAdapter } from '../../helpers/MemoryFsAdapter';

function dataId(reply: ApiReply): string {
  const data = reply.body.data;
  if (typeof data === 'object' && data !== null && 'id' in data && typeof data.id === 'string') {
    return data.id;
  }
  throw new Error(`reply carries no id: ${JSON.stringify(reply.body)}`);
}

function accessConfig(hostname: string, vlan: number): string {
  return `hostname ${hostname}\ninterface Gi0/1\n switchport mode access\n switchport access vlan ${vlan}\n`;
}

describe('API routes', () => {
  let dispatch: (request: ApiRequest) => Promise<ApiReply>;
  let fs: MemoryFsAdapter;
  let store: TopologyStore;

  beforeEach(() => {
    fs = new MemoryFsAdapter();
    store = new TopologyStore({ fs, dataDir: '/data' });
    const validator = new LinkValidationService({ store });
    const deviceLocks = new KeyedLock();
    const ingest = new FactsIngestService({ store, validator, deviceLocks });
    const topology = new TopologyService({ store, validator, deviceLocks });
    dispatch = createApiHandler(createRoutes({ store, ingest, validator, topology }));
  });

  const post = (path: string, body: unknown) => dispatch({ method: 'POST', path: `${API_PREFIX}${path}`, body });
  const get = (path: string) => dispatch({ method: 'GET', path: `${API_PREFIX}${path}` });

  it('answers the health check', async () => {
    expect(await dispatch({ method: 'GET', path: '/health' })).to.deep.equal({
      status: 200,
      body: { success: true, data: { status: 'ok' } },
    });
  });

  describe('projects', () => {
    it('creates and fetches a project', async () => {
      const created = await post('/projects', { name: 'Lab' });
      expect(created.status).to.equal(201);
      expect(created.body.data).to.have.property('name', 'Lab');

      const fetched = await get(`/projects/${dataId(created)}`);
      expect(fetched.status).to.equal(200);
      expect(fetched.body.data).to.deep.equal(created.body.data);
      expect((await get('/projects')).body.data).to.deep.equal([created.body.data]);
    });

    it('rejects invalid bodies with 400', async () => {
      expect(await post('/projects', {})).to.deep.equal({
        status: 400,
        body: {
          success: false,
          error: 'Invalid project: (root): missing required property "name"',
          details: ['(root): missing required property "name"'],
        },
      });
      const extra = await post('/projects', { name: 'Lab', colour: 'blue' });
      expect(extra.status).to.equal(400);
      expect(extra.body.details).to.deep.equal(['(root): unknown property "colour"']);
    });

    it('reports unknown ids with 404', async () => {
      expect(await get('/projects/missing')).to.deep.equal({
        status: 404,
        body: { success: false, error: 'Project not found: missing' },
      });
    });

    it('deletes a project', async () => {
      const id = dataId(await post('/projects', { name: 'Lab' }));
      const deleted = await dispatch({ method: 'DELETE', path: `${API_PREFIX}/projects/${id}` });
      expect(deleted.body).to.deep.equal({ success: true, data: { status: 'success', links: [] } });
      expect((await get(`/projects/${id}`)).status).to.equal(404);
    });
  });

  it('answers 404 for unknown paths and 405 for unsupported methods', async () => {
    expect(await dispatch({ method: 'GET', path: '/nope' })).to.deep.equal({
      status: 404,
      body: { success: false, error: 'No route for /nope' },
    });
    expect(await dispatch({ method: 'put', path: `${API_PREFIX}/projects` })).to.deep.equal({
      status: 405,
      body: { success: false, error: `Method PUT not allowed on ${API_PREFIX}/projects` },
    });
  });

  it('walks a link from pending through up to down', async () => {
    const projectId = dataId(await post('/projects', { name: 'Lab' }));
    const a = dataId(await post(`/projects/${projectId}/devices`, { hostname: 'a', role: 'access' }));
    const b = dataId(await post(`/projects/${projectId}/devices`, { hostname: 'b', role: 'access' }));

    const link = await post(`/projects/${projectId}/links`, {
      sourceDeviceId: a,
      sourceInterface: 'Gi0/1',
      targetDeviceId: b,
      targetInterface: 'Gi0/1',
    });
    expect(link.status).to.equal(201);
    expect(link.body.data).to.have.property('state', 'down');
    const linkId = dataId(link);

    const first = await post(`/configs/${a}`, { content: accessConfig('sw-a', 10) });
    expect(first.status).to.equal(201);
    expect(first.body.data)
      .to.have.property('links')
      .that.deep.equals([{ id: linkId, state: 'down', reason: 'unresolved-endpoint' }]);

    const second = await post(`/configs/${b}`, { content: accessConfig('sw-b', 10) });
    expect(second.body.data)
      .to.have.property('links')
      .that.deep.equals([{ id: linkId, state: 'up', reason: 'l2-match' }]);
    expect(second.body.data).to.have.nested.property('facts.hostname', 'sw-b');
    expect(second.body.data).to.have.nested.property('config.content', accessConfig('sw-b', 10));

    const latest = await get(`/configs/${b}/latest`);
    expect(latest.body.data).to.have.property('content', accessConfig('sw-b', 10));

    const reextracted = await post(`/configs/${b}/reextract`, undefined);
    expect(reextracted.status).to.equal(200);
    expect(reextracted.body.data).to.have.nested.property('links[0].state', 'up');

    const device = await get(`/devices/${b}`);
    expect(device.body.data).to.have.property('hostname', 'sw-b');

    const patched = await dispatch({
      method: 'PATCH',
      path: `${API_PREFIX}/links/${linkId}`,
      body: { medium: 'fiber' },
    });
    expect(patched.body.data).to.include({ medium: 'fiber', state: 'up' });

    const removed = await dispatch({ method: 'DELETE', path: `${API_PREFIX}/devices/${a}` });
    expect(removed.body.data).to.have.nested.property('links[0].state', 'down');

    const revalidated = await post(`/links/${linkId}/validate`, undefined);
    expect(revalidated.body.data).to.have.nested.property('evaluation.reason', 'unresolved-endpoint');
    expect((await get(`/projects/${projectId}/links`)).body.data).to.have.nested.property('[0].state', 'down');

    const unlinked = await dispatch({ method: 'DELETE', path: `${API_PREFIX}/links/${linkId}` });
    expect(unlinked.body).to.deep.equal({ success: true, data: { status: 'success' } });
    expect((await get(`/projects/${projectId}/links`)).body.data).to.deep.equal([]);
  });

  it('rejects empty link updates and non-string configuration content', async () => {
    const patched = await dispatch({ method: 'PATCH', path: `${API_PREFIX}/links/any`, body: {} });
    expect(patched.status).to.equal(400);
    const upload = await post('/configs/any', { content: 42 });
    expect(upload.status).to.equal(400);
    expect(upload.body.details).to.deep.equal(['/content: must be string']);
  });

  it('answers 500 when a stored project document is corrupt', async () => {
    const id = dataId(await post('/projects', { name: 'Lab' }));
    await fs.writeFile(store.getProjectFilePath(id), 'project: 3\ndevices: []\nlinks: []\n');

    const reply = await get(`/projects/${id}`);
    expect(reply.status).to.equal(500);
    expect(reply.body.success).to.equal(false);
    expect(reply.body.error).to.match(/^Invalid project document: /);
  });

  it('maps unexpected failures to 500 and logs them', async () => {
    const logger = { debug: sinon.spy(), info: sinon.spy(), warn: sinon.spy(), error: sinon.spy() };
    const handler = createApiHandler(
      [
        {
          method: 'GET',
          path: '/boom',
          handler: async () => {
            throw new Error('boom');
          },
        },
      ],
      logger
    );
    expect(await handler({ method: 'GET', path: '/boom' })).to.deep.equal({
      status: 500,
      body: { success: false, error: 'boom' },
    });
    sinon.assert.calledOnceWithExactly(logger.error, 'Request failed: boom');
  });
});

describe('matchPath', () => {
  it('extracts and decodes parameters', () => {
    expect(matchPath('/api/v1/devices/:deviceId', '/api/v1/devices/core%201')).to.deep.equal({ deviceId: 'core 1' });
  });

  it('rejects different shapes and bad encodings', () => {
    expect(matchPath('/api/v1/devices/:deviceId', '/api/v1/devices')).to.equal(undefined);
    expect(matchPath('/api/v1/devices/:deviceId', '/api/v1/links/x')).to.equal(undefined);
    expect(matchPath('/a/:id', '/a/%E0%A4%A')).to.equal(undefined);
  });
});
