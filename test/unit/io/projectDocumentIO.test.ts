/* eslint-env mocha */
/* global describe, it */
import { expect } from 'chai';
import {
  parseProjectDocument,
  stringifyProjectDocument,
  writeProjectFile,
} from '../../../src/shared/io/ProjectDocumentIO';
import { ERROR_DOCUMENT_NOT_MAP } from '../../../src/shared/io/types';
import { StorageError } from '../../../src/shared/errors';
import type { ProjectDocument } from '../../../src/shared/types/topology';
import { MemoryFsAdapter } from '../../helpers/MemoryFsAdapter';

const STAMP = '2026-01-02T03:04:05.000Z';

const MINIMAL_YAML = `
project:
  id: p1
  name: Lab
  createdAt: ${STAMP}
  updatedAt: ${STAMP}
devices:
  - id: d1
    projectId: p1
    hostname: sw1
    role: access
    createdAt: ${STAMP}
    updatedAt: ${STAMP}
    interfaces:
      - name: Gi0/1
        trunkAllowedVlans: [10, 20]
links:
  - id: l1
    projectId: p1
    sourceDeviceId: d1
    sourceInterface: Gi0/1
    targetDeviceId: d2
    targetInterface: Gi0/1
configs: []
`;

function sampleDocument(): ProjectDocument {
  return parseProjectDocument(MINIMAL_YAML);
}

describe('ProjectDocumentIO', () => {
  describe('parseProjectDocument', () => {
    it('fills defaults for optional fields', () => {
      const doc = sampleDocument();
      const [device] = doc.devices;
      expect(device.vendor).to.equal('cisco');
      expect(device.platform).to.equal('ios-xe');
      expect(device.canvasX).to.equal(0);
      expect(device.vlans).to.deep.equal([]);
      expect(device.interfaces[0]).to.deep.equal({
        name: 'Gi0/1',
        description: '',
        mode: 'access',
        trunkAllowedVlans: [10, 20],
        adminState: 'up',
      });
      expect(doc.links[0].state).to.equal('pending');
      expect(doc.links[0].medium).to.equal('ethernet');
      expect(doc.links[0].vlanAllowList).to.deep.equal([]);
    });

    it('rejects documents that are not maps', () => {
      expect(() => parseProjectDocument('- a\n- b\n')).to.throw(StorageError, ERROR_DOCUMENT_NOT_MAP);
      expect(() => parseProjectDocument('')).to.throw(StorageError, ERROR_DOCUMENT_NOT_MAP);
    });

    it('lists schema violations', () => {
      const broken = MINIMAL_YAML.replace('    role: access\n', '');
      expect(() => parseProjectDocument(broken))
        .to.throw(StorageError)
        .with.property('message', 'Invalid project document: /devices/0: missing required property "role"');
    });
  });

  describe('stringifyProjectDocument', () => {
    it('writes VLAN lists as flow sequences', () => {
      const text = stringifyProjectDocument(sampleDocument());
      expect(text).to.match(/trunkAllowedVlans: \[ ?10, 20 ?\]/);
    });

    it('round-trips through the parser', () => {
      const doc = sampleDocument();
      expect(parseProjectDocument(stringifyProjectDocument(doc))).to.deep.equal(doc);
    });
  });

  describe('writeProjectFile', () => {
    it('skips the write when content is unchanged', async () => {
      const fs = new MemoryFsAdapter();
      const doc = sampleDocument();
      const first = await writeProjectFile(doc, '/data/projects/p1.netval.yml', { fs });
      const second = await writeProjectFile(doc, '/data/projects/p1.netval.yml', { fs });
      expect(first.written).to.equal(true);
      expect(second.written).to.equal(false);
      expect(fs.writes).to.equal(1);
    });

    it('rewrites when the document changed', async () => {
      const fs = new MemoryFsAdapter();
      const doc = sampleDocument();
      await writeProjectFile(doc, '/p.yml', { fs });
      doc.project.name = 'Renamed';
      const result = await writeProjectFile(doc, '/p.yml', { fs });
      expect(result.written).to.equal(true);
      expect(parseProjectDocument(await fs.readFile('/p.yml')).project.name).to.equal('Renamed');
    });
  });
});
