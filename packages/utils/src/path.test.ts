import { getBasename, getExtension } from './path.js';

describe('getExtension', () => {
  it.each([
    ['clip.MP4', 'mp4'],
    ['/srv/media/song.flac', 'flac'],
    ['archive.tar.gz', 'gz'],
    ['README', ''],
    ['.hidden', ''],
  ])('%p -> %p', (filename, expected) => {
    expect(getExtension(filename)).toBe(expected);
  });
});

describe('getBasename', () => {
  it('drops the directory and the last extension', () => {
    expect(getBasename('/srv/media/holiday.clip.mov')).toBe('holiday.clip');
    expect(getBasename('a.mp4')).toBe('a');
  });
});
