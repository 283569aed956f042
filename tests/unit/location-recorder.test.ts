import { describe, it, expect } from 'vitest';

import { LocationRecorder, toLookup } from '../../src/core/location-recorder.js';

describe('LocationRecorder', () => {
  it('tells a missing service apart from one with an empty body', () => {
    const recorder = new LocationRecorder();
    recorder.record({ file: 'a.yml', service: 'api', lineStart: 1, lineEnd: 1, indent: 2 });
    recorder.record({ file: 'a.yml', service: 'web', lineStart: 2, lineEnd: 5, indent: 2 });

    expect(recorder.lookup('a.yml', 'db')).toEqual({ found: false });
    expect(recorder.lookup('b.yml', 'api')).toEqual({ found: false });
    expect(recorder.lookup('a.yml', 'api')).toMatchObject({ found: true, empty: true });
    expect(recorder.lookup('a.yml', 'web')).toMatchObject({ found: true, empty: false });
  });

  it('keeps every occurrence and looks up the latest', () => {
    const recorder = new LocationRecorder();
    recorder.record({ file: 'a.yml', service: 'api', lineStart: 1, lineEnd: 3, indent: 2 });
    recorder.record({ file: 'a.yml', service: 'api', lineStart: 8, lineEnd: 9, indent: 2 });

    expect(recorder.lookup('a.yml', 'api')).toMatchObject({ location: { lineStart: 8, lineEnd: 9 } });
    expect(recorder.occurrences('a.yml', 'api').map((l) => l.lineStart)).toEqual([1, 8]);
    expect(recorder.occurrences('a.yml', 'db')).toEqual([]);
  });

  it("lists a file's locations in line order", () => {
    const recorder = new LocationRecorder();
    recorder.record({ file: 'b.yml', service: 'z', lineStart: 1, lineEnd: 2, indent: 2 });
    recorder.record({ file: 'a.yml', service: 'web', lineStart: 6, lineEnd: 7, indent: 2 });
    recorder.record({ file: 'a.yml', service: 'api', lineStart: 1, lineEnd: 5, indent: 2 });
    recorder.record({ file: 'a.yml', service: 'api', lineStart: 9, lineEnd: 9, indent: 2 });

    expect(recorder.forFile('a.yml').map((l) => [l.service, l.lineStart])).toEqual([
      ['api', 1],
      ['web', 6],
      ['api', 9],
    ]);
    expect(recorder.forFile('c.yml')).toEqual([]);
  });
});

describe('toLookup', () => {
  it('marks a block without body lines as empty', () => {
    const location = { file: 'a.yml', service: 'api', lineStart: 4, lineEnd: 4, indent: 2 };
    expect(toLookup(location)).toEqual({ found: true, location, empty: true });
  });
});
