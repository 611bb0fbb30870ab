import { describe, expect, it } from 'vitest';
import {
  collectionDocument,
  encodeVirtualPath,
  errorDocument,
  FILES_BASE_PATH,
  resourceFrom,
} from '../../src/api/jsonapi.js';
import { applyListParams } from '../../src/api/query.js';
import { fakeDescriptor } from '../helpers.js';

describe('resourceFrom', () => {
  it('serializes every attribute with nulls for absent values', () => {
    const descriptor = fakeDescriptor('notes.txt', {
      sizeBytes: 42,
      accessedAt: new Date('2024-01-02T03:04:05.000Z'),
      modifiedAt: new Date('2024-01-02T03:04:06.000Z'),
      changedAt: new Date('2024-01-02T03:04:07.000Z'),
    });

    expect(resourceFrom(descriptor)).toEqual({
      id: '/docs/notes.txt',
      type: 'files',
      attributes: {
        name: 'notes.txt',
        resource_kind: 'file',
        size_bytes: 42,
        permission_mode: '0644',
        user: 'tester',
        group: 'testers',
        user_id: 1000,
        group_id: 1000,
        mime_type: 'text/plain; charset=utf-8',
        accessed_at: '2024-01-02T03:04:05.000Z',
        modified_at: '2024-01-02T03:04:06.000Z',
        changed_at: '2024-01-02T03:04:07.000Z',
        born_at: null,
      },
      links: { self: '/api/v1/files/docs/notes.txt' },
    });
  });

  it('reports a missing size as null', () => {
    const folder = fakeDescriptor('archive', { resourceKind: 'folder', sizeBytes: undefined });
    expect(resourceFrom(folder).attributes.size_bytes).toBeNull();
  });

  it('encodes link segments', () => {
    const descriptor = fakeDescriptor('a b#1.txt', { virtualPath: '/docs/a b#1.txt' });

    expect(resourceFrom(descriptor).links.self).toBe('/api/v1/files/docs/a%20b%231.txt');
    expect(encodeVirtualPath('/docs/文件.txt')).toBe('/docs/%E6%96%87%E4%BB%B6.txt');
  });

  it('links the slash root to the endpoint itself', () => {
    const descriptor = fakeDescriptor('/', { virtualPath: '/', resourceKind: 'folder' });
    expect(resourceFrom(descriptor).links.self).toBe(FILES_BASE_PATH);
  });
});

describe('collectionDocument', () => {
  it('wraps a page with meta and links', () => {
    const params = { limit: 1, offset: 1, sortField: 'name' as const, descending: false };
    const page = applyListParams([fakeDescriptor('a'), fakeDescriptor('b')], params, '/api/v1/files/docs');

    const document = collectionDocument(page, params.offset, params.limit);

    expect(document.meta).toEqual({ total_count: 2, offset: 1, limit: 1 });
    expect(document.data.map(resource => resource.id)).toEqual(['/docs/b']);
    expect(document.links.prev).toBe('/api/v1/files/docs?page[offset]=0&page[limit]=1');
    expect(document.links.next).toBeNull();
  });
});

describe('errorDocument', () => {
  it('uses the status text as title', () => {
    expect(errorDocument(404, 'file not found')).toEqual({
      errors: [{ status: '404', title: 'Not Found', detail: 'file not found' }],
    });
    expect(errorDocument(408, 'request canceled').errors[0]?.title).toBe('Request Timeout');
  });
});
