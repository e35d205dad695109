import { createOutlineConfig } from '../../config/outline.config';
import { PageIndex } from '../pages/page-index';
import { DocumentMetadataParser } from './document-metadata.parser';

describe('DocumentMetadataParser', () => {
  const parser = new DocumentMetadataParser(createOutlineConfig());

  it('reads title, revision, version and release date', () => {
    const pageIndex = new PageIndex([
      {
        page: 1,
        text: [
          'ACME Widget Protocol Specification',
          'Revision 2.1',
          'Version: 3.0',
          'Release Date: 2023-07',
        ].join('\n'),
      },
    ]);

    expect(parser.parse(pageIndex)).toEqual({
      title: 'ACME Widget Protocol Specification',
      revision: '2.1',
      version: '3.0',
      releaseDate: '2023-07',
    });
  });

  it('falls back to the configured title and Unknown', () => {
    expect(parser.parse(new PageIndex([{ page: 1, text: 'Hello world' }]))).toEqual({
      title: 'Untitled Document',
      revision: 'Unknown',
      version: 'Unknown',
      releaseDate: 'Unknown',
    });
  });

  it('drops a trailing period from numbers', () => {
    const pageIndex = new PageIndex([{ page: 1, text: 'Rev. 1.2.' }]);
    expect(parser.parse(pageIndex).revision).toBe('1.2');
  });

  it('needs a version word or a v glued to the number', () => {
    const ratings = new PageIndex([{ page: 1, text: 'Supply 5 V 20 mA' }]);
    const tagged = new PageIndex([
      { page: 1, text: 'Supply 5 V 20 mA\nFirmware v2.4' },
    ]);

    expect(parser.parse(ratings).version).toBe('Unknown');
    expect(parser.parse(tagged).version).toBe('2.4');
  });

  it('only scans the configured number of opening pages', () => {
    const shallow = new DocumentMetadataParser(
      createOutlineConfig({ metadataScanPages: 1 }),
    );
    const pageIndex = new PageIndex([
      { page: 1, text: 'Cover' },
      { page: 2, text: 'Revision 4' },
    ]);

    expect(shallow.parse(pageIndex).revision).toBe('Unknown');
  });
});
