import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createHash } from 'node:crypto';

import {
  downloadRdmanifest,
  fetchFile,
  InvalidRdmanifestError,
  loadRdmanifest,
  ResolvedSourceInstall
} from '../../../packages/core/src/core/source-install/rdmanifest.js';
import { DownloadFailureError } from '../../../packages/core/src/utils/errors.js';
import { FakeDownloader } from '../../test-helpers.js';

const MANIFEST_URL = 'https://example.org/foo.rdmanifest';
const MIRROR_URL = 'https://mirror.example.org/foo.rdmanifest';
const MANIFEST = 'uri: https://example.org/foo-1.0.tar.gz\nexec-path: foo-1.0\ninstall-script: make install\ndepends: [bar]\n';

const md5 = (text: string) => createHash('md5').update(text).digest('hex');

describe('ResolvedSourceInstall', () => {
  it('fills defaults for optional fields', () => {
    const resolved = ResolvedSourceInstall.fromManifest({ uri: 'https://example.org/foo.tar.gz' }, MANIFEST_URL);

    assert.equal(resolved.manifestUrl, MANIFEST_URL);
    assert.equal(resolved.tarball, 'https://example.org/foo.tar.gz');
    assert.equal(resolved.installScript, '');
    assert.equal(resolved.checkPresenceScript, '');
    assert.equal(resolved.execPath, '.');
    assert.equal(resolved.alternateTarball, undefined);
    assert.equal(resolved.tarballMd5sum, undefined);
    assert.deepEqual(resolved.dependencies, []);
    assert.equal(resolved.toString(), `source: ${MANIFEST_URL}`);
  });

  it('reads every manifest field', () => {
    const resolved = ResolvedSourceInstall.fromManifest({
      'uri': 'https://example.org/foo.tar.gz',
      'alternate-uri': 'https://mirror.example.org/foo.tar.gz',
      'md5sum': '0123456789abcdef0123456789abcdef',
      'exec-path': 'foo-1.0',
      'check-presence-script': 'test -f /usr/lib/libfoo.so',
      'install-script': 'make install',
      'depends': ['bar', 'baz']
    }, MANIFEST_URL);

    assert.equal(resolved.alternateTarball, 'https://mirror.example.org/foo.tar.gz');
    assert.equal(resolved.tarballMd5sum, '0123456789abcdef0123456789abcdef');
    assert.equal(resolved.execPath, 'foo-1.0');
    assert.equal(resolved.checkPresenceScript, 'test -f /usr/lib/libfoo.so');
    assert.equal(resolved.installScript, 'make install');
    assert.deepEqual(resolved.dependencies, ['bar', 'baz']);
  });

  it('requires a uri', () => {
    assert.throws(
      () => ResolvedSourceInstall.fromManifest({ 'install-script': 'make' }, MANIFEST_URL),
      (error: unknown) => error instanceof InvalidRdmanifestError && error.message === 'uri required for source dependencies'
    );
  });

  it('rejects manifests that are not dictionaries or have mistyped fields', () => {
    assert.throws(() => ResolvedSourceInstall.fromManifest(['uri'], MANIFEST_URL), InvalidRdmanifestError);
    assert.throws(() => ResolvedSourceInstall.fromManifest({ uri: 'x', depends: 'bar' }, MANIFEST_URL), InvalidRdmanifestError);
    assert.throws(() => ResolvedSourceInstall.fromManifest({ uri: 42 }, MANIFEST_URL), InvalidRdmanifestError);
  });
});

describe('rdmanifest download', () => {
  it('reports invalid YAML as an invalid manifest', () => {
    assert.throws(() => loadRdmanifest('uri: [unclosed'), InvalidRdmanifestError);
  });

  it('checks the md5sum of the downloaded text', async () => {
    const downloader = new FakeDownloader({ [MANIFEST_URL]: MANIFEST });

    assert.deepEqual(await fetchFile(downloader, MANIFEST_URL, md5(MANIFEST)), { ok: true, contents: MANIFEST });
    assert.deepEqual(await fetchFile(downloader, MANIFEST_URL, 'ffffffffffffffffffffffffffffffff'), {
      ok: false,
      error: `md5sum didn't match for ${MANIFEST_URL}.  Expected ffffffffffffffffffffffffffffffff got ${md5(MANIFEST)}`
    });
  });

  it('treats an empty body as a failed fetch', async () => {
    const result = await fetchFile(new FakeDownloader({ [MANIFEST_URL]: '' }), MANIFEST_URL);
    assert.deepEqual(result, { ok: false, error: `empty response from ${MANIFEST_URL}` });
  });

  it('parses the manifest from the primary location', async () => {
    const downloader = new FakeDownloader({ [MANIFEST_URL]: MANIFEST, [MIRROR_URL]: MANIFEST });
    const { manifest, downloadUrl } = await downloadRdmanifest(downloader, MANIFEST_URL, undefined, MIRROR_URL);

    assert.equal(downloadUrl, MANIFEST_URL);
    assert.deepEqual(manifest, {
      'uri': 'https://example.org/foo-1.0.tar.gz',
      'exec-path': 'foo-1.0',
      'install-script': 'make install',
      'depends': ['bar']
    });
    assert.deepEqual(downloader.calls, [MANIFEST_URL]);
  });

  it('falls back to the mirror', async () => {
    const downloader = new FakeDownloader({ [MIRROR_URL]: MANIFEST });
    const { downloadUrl } = await downloadRdmanifest(downloader, MANIFEST_URL, md5(MANIFEST), MIRROR_URL);
    assert.equal(downloadUrl, MIRROR_URL);
  });

  it('names both locations when both fail', async () => {
    await assert.rejects(
      downloadRdmanifest(new FakeDownloader(), MANIFEST_URL, undefined, MIRROR_URL),
      (error: unknown) => error instanceof DownloadFailureError
        && error.message === `Failed to load a rdmanifest from either ${MANIFEST_URL} or ${MIRROR_URL}: Failed to download ${MIRROR_URL}: HTTP 404 Not Found`
    );
  });

  it('names the single location without a mirror', async () => {
    await assert.rejects(
      downloadRdmanifest(new FakeDownloader(), MANIFEST_URL),
      (error: unknown) => error instanceof DownloadFailureError
        && error.message === `Failed to load a rdmanifest from ${MANIFEST_URL}: Failed to download ${MANIFEST_URL}: HTTP 404 Not Found`
    );
  });
});
