// 패키지 조회/다운로드 에러

export type NuGetFetchErrorCode = 'InvalidVersion' | 'PackageNotFound' | 'TransportFailure';

export class NuGetFetchError extends Error {
  readonly code: NuGetFetchErrorCode;

  constructor(code: NuGetFetchErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'NuGetFetchError';
    this.code = code;
  }
}

/**
 * NuGetFetchError 여부 확인 (code를 주면 코드까지 비교)
 */
export function isNuGetFetchError(
  error: unknown,
  code?: NuGetFetchErrorCode
): error is NuGetFetchError {
  if (!(error instanceof NuGetFetchError)) return false;
  return code === undefined || error.code === code;
}

/**
 * 알 수 없는 에러를 TransportFailure로 감싼다 (이미 NuGetFetchError면 그대로)
 */
export function toTransportFailure(error: unknown, context: string): NuGetFetchError {
  if (error instanceof NuGetFetchError) return error;
  const reason = error instanceof Error ? error.message : String(error);
  return new NuGetFetchError('TransportFailure', `${context}: ${reason}`, error);
}
