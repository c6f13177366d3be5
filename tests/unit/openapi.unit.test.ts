import { buildOpenApiDocument } from '../../src/openapi.js';

describe('buildOpenApiDocument', () => {
  const doc = buildOpenApiDocument('1.2.3');

  it('should carry the version and the shared components', () => {
    expect(doc).toMatchObject({
      components: { parameters: { TagId: { in: 'path', name: 'tagId' } } },
      info: { title: 'PromptLab API', version: '1.2.3' },
      openapi: '3.0.0',
    });
  });

  it('should collect every route from the annotated handlers', () => {
    expect(doc).toHaveProperty('paths', {
      '/collections': expect.objectContaining({ get: expect.any(Object), post: expect.any(Object) }),
      '/collections/{collectionId}': expect.objectContaining({ delete: expect.any(Object), get: expect.any(Object) }),
      '/health': expect.objectContaining({ get: expect.any(Object) }),
      '/prompts': expect.objectContaining({ get: expect.any(Object), post: expect.any(Object) }),
      '/prompts/{promptId}': expect.objectContaining({
        delete: expect.any(Object),
        get: expect.any(Object),
        patch: expect.any(Object),
        put: expect.any(Object),
      }),
      '/prompts/{promptId}/tags': expect.objectContaining({ delete: expect.any(Object), post: expect.any(Object) }),
      '/tags': expect.objectContaining({ get: expect.any(Object), post: expect.any(Object) }),
      '/tags/{tagId}': expect.objectContaining({ delete: expect.any(Object), get: expect.any(Object) }),
      '/tags/{tagId}/prompts': expect.objectContaining({ get: expect.any(Object) }),
    });
  });

  it('should document both spellings of the tag match parameter', () => {
    expect(doc).toHaveProperty(
      ['paths', '/prompts', 'get', 'parameters'],
      expect.arrayContaining([
        expect.objectContaining({ in: 'query', name: 'tagMatch' }),
        expect.objectContaining({ in: 'query', name: 'tag_match' }),
        expect.objectContaining({ in: 'query', name: 'collection_id' }),
      ]),
    );
  });
});
