// NuGet 버전 파싱, 비교, 범위 처리 유틸리티

import { VersionRange } from '../../types';
import { NuGetFetchError } from './errors';

/** 파싱된 NuGet 버전 */
export interface NuGetVersion {
  major: number;
  minor: number;
  patch: number;
  revision: number;
  releaseLabels: string[];
  metadata?: string;
}

// major[.minor[.patch[.revision]]][-label.label][+metadata]
const VERSION_PATTERN =
  /^(\d+)(?:\.(\d+))?(?:\.(\d+))?(?:\.(\d+))?(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?$/;

/**
 * 버전 문자열 파싱. 형식이 맞지 않으면 null
 */
export function parseVersion(text: string): NuGetVersion | null {
  const match = text.trim().match(VERSION_PATTERN);
  if (!match) return null;

  const toNumber = (part: string | undefined): number => (part ? parseInt(part, 10) : 0);

  return {
    major: toNumber(match[1]),
    minor: toNumber(match[2]),
    patch: toNumber(match[3]),
    revision: toNumber(match[4]),
    releaseLabels: match[5] ? match[5].split('.') : [],
    metadata: match[6],
  };
}

/**
 * 파싱 실패 시 InvalidVersion 에러
 */
export function parseVersionStrict(text: string): NuGetVersion {
  const version = parseVersion(text);
  if (!version) {
    throw new NuGetFetchError('InvalidVersion', `버전 형식이 올바르지 않습니다: ${text}`);
  }
  return version;
}

/**
 * 정규화된 문자열 (1.0 -> 1.0.0, revision은 0이 아닐 때만, 메타데이터 제외)
 */
export function formatVersion(version: NuGetVersion): string {
  let text = `${version.major}.${version.minor}.${version.patch}`;
  if (version.revision > 0) {
    text += `.${version.revision}`;
  }
  if (version.releaseLabels.length > 0) {
    text += `-${version.releaseLabels.join('.')}`;
  }
  return text;
}

export function normalizeVersion(text: string): string {
  return formatVersion(parseVersionStrict(text));
}

export function isPrereleaseVersion(text: string): boolean {
  const version = parseVersion(text);
  return version !== null && version.releaseLabels.length > 0;
}

function compareLabel(a: string, b: string): number {
  const aNumeric = /^\d+$/.test(a);
  const bNumeric = /^\d+$/.test(b);

  if (aNumeric && bNumeric) {
    return parseInt(a, 10) - parseInt(b, 10);
  }
  // 숫자 레이블이 문자 레이블보다 낮음
  if (aNumeric) return -1;
  if (bNumeric) return 1;

  const upperA = a.toUpperCase();
  const upperB = b.toUpperCase();
  if (upperA === upperB) return 0;
  return upperA < upperB ? -1 : 1;
}

/**
 * 파싱된 버전 비교 (메타데이터는 무시)
 * @returns a > b면 양수, a < b면 음수, 같으면 0
 */
export function compareParsedVersions(a: NuGetVersion, b: NuGetVersion): number {
  if (a.major !== b.major) return a.major - b.major;
  if (a.minor !== b.minor) return a.minor - b.minor;
  if (a.patch !== b.patch) return a.patch - b.patch;
  if (a.revision !== b.revision) return a.revision - b.revision;

  const aRelease = a.releaseLabels.length === 0;
  const bRelease = b.releaseLabels.length === 0;
  if (aRelease && bRelease) return 0;
  // 정식 릴리스 > 프리릴리스
  if (aRelease) return 1;
  if (bRelease) return -1;

  const length = Math.min(a.releaseLabels.length, b.releaseLabels.length);
  for (let i = 0; i < length; i++) {
    const result = compareLabel(a.releaseLabels[i], b.releaseLabels[i]);
    if (result !== 0) return result;
  }
  return a.releaseLabels.length - b.releaseLabels.length;
}

/**
 * 버전 문자열 비교
 */
export function compareVersions(a: string, b: string): number {
  return compareParsedVersions(parseVersionStrict(a), parseVersionStrict(b));
}

// ============================================
// 버전 범위
// ============================================

/** 모든 버전 허용 */
const UNBOUNDED_RANGE: VersionRange = {
  minInclusive: false,
  maxInclusive: false,
  originalText: '',
};

/**
 * NuGet 구간 표기 파싱
 * 지원: 1.0 (>= 1.0), [1.0] (== 1.0), (1.0,) (> 1.0), (,1.0] (<= 1.0), [1.0,2.0) 등
 * 빈 문자열은 모든 버전. 형식이 맞지 않으면 null
 */
export function parseVersionRange(text: string | undefined): VersionRange | null {
  const trimmed = (text ?? '').trim();
  if (!trimmed) {
    return { ...UNBOUNDED_RANGE };
  }

  const first = trimmed[0];
  const last = trimmed[trimmed.length - 1];

  // 괄호 없는 단일 버전은 최소 버전(포함)
  if (first !== '[' && first !== '(') {
    const version = parseVersion(trimmed);
    if (!version) return null;
    return {
      minVersion: formatVersion(version),
      minInclusive: true,
      maxInclusive: false,
      originalText: trimmed,
    };
  }

  if (last !== ']' && last !== ')') return null;

  const minInclusive = first === '[';
  const maxInclusive = last === ']';
  const inner = trimmed.slice(1, -1);
  const parts = inner.split(',');

  if (parts.length === 1) {
    // [1.0] 형태만 허용
    if (!minInclusive || !maxInclusive) return null;
    const exact = parseVersion(parts[0]);
    if (!exact) return null;
    const normalized = formatVersion(exact);
    return {
      minVersion: normalized,
      minInclusive: true,
      maxVersion: normalized,
      maxInclusive: true,
      originalText: trimmed,
    };
  }

  if (parts.length !== 2) return null;

  const minText = parts[0].trim();
  const maxText = parts[1].trim();
  if (!minText && !maxText) return null;

  const min = minText ? parseVersion(minText) : null;
  const max = maxText ? parseVersion(maxText) : null;
  if ((minText && !min) || (maxText && !max)) return null;

  if (min && max) {
    const order = compareParsedVersions(min, max);
    if (order > 0) return null;
    if (order === 0 && !(minInclusive && maxInclusive)) return null;
  }

  return {
    minVersion: min ? formatVersion(min) : undefined,
    minInclusive,
    maxVersion: max ? formatVersion(max) : undefined,
    maxInclusive,
    originalText: trimmed,
  };
}

/**
 * 범위 만족 여부
 */
export function satisfiesRange(version: string, range: VersionRange): boolean {
  const parsed = parseVersionStrict(version);

  if (range.minVersion !== undefined) {
    const order = compareParsedVersions(parsed, parseVersionStrict(range.minVersion));
    if (range.minInclusive ? order < 0 : order <= 0) return false;
  }

  if (range.maxVersion !== undefined) {
    const order = compareParsedVersions(parsed, parseVersionStrict(range.maxVersion));
    if (range.maxInclusive ? order > 0 : order >= 0) return false;
  }

  return true;
}

/**
 * 메시지 출력용 범위 문자열
 */
export function formatVersionRange(range: VersionRange): string {
  if (range.originalText) return range.originalText;

  const { minVersion, maxVersion } = range;
  if (minVersion === undefined && maxVersion === undefined) return '(*)';
  if (minVersion !== undefined && minVersion === maxVersion) return `[${minVersion}]`;
  if (maxVersion === undefined && range.minInclusive) return `${minVersion}`;

  return `${range.minInclusive ? '[' : '('}${minVersion ?? ''}, ${maxVersion ?? ''}${range.maxInclusive ? ']' : ')'}`;
}
