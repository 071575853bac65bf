/**
 * LLVM Release Details
 *
 * Parses LLVM release numbers and derives the source tarballs each release
 * publishes. Only the fetcher needs this; the store and activator treat
 * versions as opaque strings.
 */

/**
 * Source components a release may ship as separate tarballs
 */
export type TarballComponent = 'llvm' | 'clang' | 'compiler-rt' | 'libcxx';

export interface LlvmRelease {
  major: number;
  minor: number;
  /** Only present from 3.4.1 onwards */
  revision: number | null;
  /** Normalized version string, e.g. "3.4" or "9.0.0" */
  version: string;
  /** Tarball file extension for this release */
  extension: string;
  /** Tarball base name per component, or null when not built on this platform */
  tarballs: Record<TarballComponent, string | null>;
}

/**
 * Parse a release number.
 *
 * 2.6 is the first release with a clang tarball, 3.4.1 the first with a
 * revision number, and every release after 3.4 has one.
 *
 * @returns Release details, or null for strings that aren't a known release scheme
 */
export function parseRelease(versionString: string, platform: NodeJS.Platform): LlvmRelease | null {
  if (!/^\d+(\.\d+){1,2}$/.test(versionString)) {
    return null;
  }

  const parts = versionString.split('.').map((part) => Number.parseInt(part, 10));
  const [major, minor, revision] = parts;
  if (major === undefined || minor === undefined) {
    return null;
  }

  if (major < 2 || (major === 2 && minor < 6)) {
    return null;
  }
  if (revision !== undefined && (major < 3 || (major === 3 && minor < 4))) {
    return null;
  }
  if (revision === undefined && (major > 3 || (major === 3 && minor > 4))) {
    return null;
  }

  const release = { major, minor, revision: revision ?? null };
  return {
    ...release,
    version: revision === undefined ? `${major}.${minor}` : `${major}.${minor}.${revision}`,
    extension: tarballExtension(major, minor),
    tarballs: listTarballs(major, minor, release.revision, platform),
  };
}

/**
 * 2.7-2.9 use .tgz, 2.6 and 3.0 use .tar.gz, 3.1-3.4.2 use .src.tar.gz,
 * and 3.5.0 onwards use .src.tar.xz.
 */
function tarballExtension(major: number, minor: number): string {
  if (major === 2 && minor > 6) {
    return '.tgz';
  }
  if ((major === 2 && minor === 6) || (major === 3 && minor === 0)) {
    return '.tar.gz';
  }
  if (major === 3 && minor < 5) {
    return '.src.tar.gz';
  }
  return '.src.tar.xz';
}

function listTarballs(
  major: number,
  minor: number,
  revision: number | null,
  platform: NodeJS.Platform
): Record<TarballComponent, string | null> {
  // clang was published as "cfe" in 3.3 and from 3.4.1 on
  const clangNamedClang =
    major < 3 || (major === 3 && (minor < 3 || (minor === 4 && revision === null)));

  const atLeast = (wantMajor: number, wantMinor: number): boolean =>
    major > wantMajor || (major === wantMajor && minor >= wantMinor);

  return {
    llvm: 'llvm',
    clang: clangNamedClang ? 'clang' : 'cfe',
    'compiler-rt': platform !== 'win32' && atLeast(3, 1) ? 'compiler-rt' : null,
    libcxx: platform === 'darwin' && atLeast(3, 3) ? 'libcxx' : null,
  };
}

/**
 * compiler-rt and libcxx stayed at 3.4 for the 3.4.1 and 3.4.2 releases.
 */
function tarballVersion(release: LlvmRelease, component: TarballComponent): string {
  if (
    (component === 'compiler-rt' || component === 'libcxx') &&
    release.major === 3 &&
    release.minor === 4
  ) {
    return `${release.major}.${release.minor}`;
  }
  return release.version;
}

/**
 * Tarball file name for a component, or null if the release doesn't ship it here.
 */
export function tarballFilename(release: LlvmRelease, component: TarballComponent): string | null {
  const base = release.tarballs[component];
  if (base === null) {
    return null;
  }
  return `${base}-${tarballVersion(release, component)}${release.extension}`;
}

/**
 * Download URL for a component's tarball.
 *
 * @param baseUrl - Release server root, e.g. https://releases.llvm.org
 */
export function tarballUrl(
  release: LlvmRelease,
  component: TarballComponent,
  baseUrl: string
): string | null {
  const filename = tarballFilename(release, component);
  if (filename === null) {
    return null;
  }
  return `${baseUrl.replace(/\/+$/, '')}/${tarballVersion(release, component)}/${filename}`;
}

/**
 * Components that are present for this release, in download order.
 */
export function releaseComponents(release: LlvmRelease): TarballComponent[] {
  const order: TarballComponent[] = ['llvm', 'clang', 'compiler-rt', 'libcxx'];
  return order.filter((component) => release.tarballs[component] !== null);
}
