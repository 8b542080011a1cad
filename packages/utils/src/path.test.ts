import { describe, it } from 'node:test';
import assert from 'node:assert';
import { isTarball, lastSegment, sanitizeFilename } from './path.js';

describe('path utilities', () => {
  describe('lastSegment', () => {
    it('should return the last segment of a URL', () => {
      assert.strictEqual(lastSegment('https://github.com/acme/MyExtension.git'), 'MyExtension.git');
    });

    it('should ignore trailing slashes', () => {
      assert.strictEqual(lastSegment('/opt/extensions/MyExtension/'), 'MyExtension');
    });

    it('should split scp-style git remotes on the colon', () => {
      assert.strictEqual(lastSegment('git@github.com:MyExtension.git'), 'MyExtension.git');
    });
  });

  describe('sanitizeFilename', () => {
    it('should replace reserved characters', () => {
      assert.strictEqual(sanitizeFilename('a:b/c'), 'a_b_c');
    });

    it('should trim surrounding dots and whitespace', () => {
      assert.strictEqual(sanitizeFilename('  ..hidden.. '), 'hidden');
    });
  });

  describe('isTarball', () => {
    it('should recognise gzip tarballs', () => {
      assert.strictEqual(isTarball('graalvm.tar.gz'), true);
      assert.strictEqual(isTarball('JDK.TGZ'), true);
      assert.strictEqual(isTarball('ghidra.zip'), false);
    });
  });
});
