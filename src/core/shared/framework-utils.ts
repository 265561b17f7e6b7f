/**
 * 타겟 프레임워크 모니커(TFM) 처리
 *
 * 의존성 그룹의 targetFramework 값은 서버에 따라 ".NETStandard2.0", "netstandard2.0",
 * "net8.0", "net472" 등 다양한 형태로 내려온다. 필터링은 프레임워크 식별자
 * (.NETFramework, .NETStandard, .NETCoreApp ...) 단위로 한다.
 */

const SHORT_IDENTIFIERS: Array<[RegExp, string]> = [
  [/^netstandard/, '.NETStandard'],
  [/^netcoreapp/, '.NETCoreApp'],
  [/^netcore/, '.NETCore'],
  [/^netmf/, '.NETMicroFramework'],
  [/^uap/, 'UAP'],
  [/^monoandroid/, 'MonoAndroid'],
  [/^monotouch/, 'MonoTouch'],
  [/^xamarinios/, 'Xamarin.iOS'],
  [/^xamarinmac/, 'Xamarin.Mac'],
  [/^portable-/, '.NETPortable'],
  [/^sl/, 'Silverlight'],
  [/^wp/, 'WindowsPhone'],
  [/^win/, 'Windows'],
];

/**
 * 모니커에서 프레임워크 식별자 추출
 * @returns 식별자. 빈 값이나 any는 null (모든 프레임워크에 적용)
 */
export function getFrameworkIdentifier(tfm: string | undefined): string | null {
  const trimmed = (tfm ?? '').trim();
  const lower = trimmed.toLowerCase();

  if (!lower || lower === 'any' || lower === 'agnostic') {
    return null;
  }

  // 긴 형식: .NETStandard2.0, .NETFramework,Version=v4.5, Xamarin.iOS1.0, UAP10.0
  if (trimmed.startsWith('.') || /[A-Z]/.test(trimmed)) {
    const verbose = trimmed.match(/^\.?[A-Za-z]+(?:\.[A-Za-z]+)*/);
    return verbose ? verbose[0] : trimmed;
  }

  // 짧은 형식
  const netMatch = lower.match(/^net(\d+)(?:\.(\d+))?/);
  if (netMatch) {
    // net5.0 이상은 .NETCoreApp, net45/net472/net4.8은 .NETFramework
    const major = netMatch[2] !== undefined ? parseInt(netMatch[1], 10) : parseInt(netMatch[1][0], 10);
    return major >= 5 ? '.NETCoreApp' : '.NETFramework';
  }

  for (const [pattern, identifier] of SHORT_IDENTIFIERS) {
    if (pattern.test(lower)) {
      return identifier;
    }
  }

  return trimmed;
}

/**
 * 허용 목록 기준으로 의존성 그룹을 따를지 판단
 * 허용 목록이 비어 있으면 모두 허용, 프레임워크가 없는 그룹은 항상 허용
 */
export function isFrameworkAccepted(
  tfm: string | undefined,
  acceptedIdentifiers: readonly string[]
): boolean {
  const identifier = getFrameworkIdentifier(tfm);
  if (identifier === null || acceptedIdentifiers.length === 0) {
    return true;
  }

  // 허용 목록에는 식별자(.NETStandard)와 모니커(netstandard2.0) 모두 올 수 있음
  const lower = identifier.toLowerCase();
  return acceptedIdentifiers.some(
    (accepted) => (getFrameworkIdentifier(accepted) ?? accepted.trim()).toLowerCase() === lower
  );
}
