import { isHttpUrl, stripTrailingSlash } from './url';

describe('stripTrailingSlash', () => {
  it('removes one trailing slash', () => {
    expect(stripTrailingSlash('https://sigs.example.com/')).toBe('https://sigs.example.com');
  });

  it('removes only the last of several slashes', () => {
    expect(stripTrailingSlash('https://sigs.example.com//')).toBe('https://sigs.example.com/');
  });

  it('leaves URLs without a trailing slash alone', () => {
    expect(stripTrailingSlash('https://sigs.example.com/sigs')).toBe('https://sigs.example.com/sigs');
  });
});

describe('isHttpUrl', () => {
  it('accepts http and https', () => {
    expect(isHttpUrl('http://localhost:8081/sigs')).toBe(true);
    expect(isHttpUrl('https://sigs.example.com')).toBe(true);
  });

  it('rejects other schemes and relative paths', () => {
    expect(isHttpUrl('ftp://sigs.example.com')).toBe(false);
    expect(isHttpUrl('/sigs')).toBe(false);
    expect(isHttpUrl('')).toBe(false);
  });
});
