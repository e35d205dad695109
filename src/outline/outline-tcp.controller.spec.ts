import { Test } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { OutlineModule } from './outline.module';
import { OutlineTcpController } from './outline-tcp.controller';

describe('OutlineTcpController', () => {
  let controller: OutlineTcpController;

  const pages = [
    { page: 1, text: 'Table of Contents' },
    { page: 2, text: '1 Introduction .... 3' },
    { page: 3, text: '2 Overview .... 5' },
  ];

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }),
        OutlineModule,
      ],
    }).compile();

    controller = moduleRef.get(OutlineTcpController);
  });

  it('returns a serialized outline', () => {
    const response = controller.extractOutline({
      pages,
      docTitle: 'Widget Spec',
    });

    expect(response.success).toBe(true);
    expect(response.outline?.sections.map((s) => s.tags)).toEqual([
      [],
      [],
      ['introductory'],
    ]);
    expect(response.outline?.tocEntries[0].tags).toEqual(['introductory']);
  });

  it('accepts TOC entries in their JSON form', () => {
    const response = controller.extractOutline({
      pages,
      tocEntries: [
        { sectionId: '1', title: 'Introduction', page: 2, tags: ['introductory'] },
      ],
    });

    expect(response.outline?.sections.map((s) => s.sectionId)).toEqual([
      'Page-1',
      '1',
    ]);
    expect(response.outline?.tocEntries[0]).toEqual({
      sectionId: '1',
      title: 'Introduction',
      page: 2,
      level: 1,
      parentId: null,
      fullPath: '1 Introduction',
      tags: ['introductory'],
    });
    expect(response.outline?.stats.toc).toBeNull();
  });

  it('reports failures instead of throwing', () => {
    expect(controller.extractOutline({ pages: [{ foo: 1 }] })).toEqual({
      success: false,
      outline: null,
      error: 'Pages must be a list of {page, text} records',
    });
  });

  it('returns TOC entries only', () => {
    const response = controller.extractToc({ pages });

    expect(response.success).toBe(true);
    expect(response.entries.map((e) => [e.sectionId, e.page])).toEqual([
      ['1', 3],
    ]);
    expect(response.stats?.tocMarkerFound).toBe(true);
  });
});
