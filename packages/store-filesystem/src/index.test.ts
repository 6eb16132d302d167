import * as filesystem from './index.js';

describe('store-filesystem index exports', () => {
  it('re-exports the file system cache store', () => {
    expect(filesystem.FileSystemCacheStore).toBeTypeOf('function');
  });
});
