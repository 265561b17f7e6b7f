#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { FetchCommandOptions } from './request';

// 버전 정보
const VERSION = '1.0.0';

// 메인 프로그램
const program = new Command();

program
  .name('nupkg-fetch')
  .description(chalk.cyan('nupkg-fetch - NuGet 패키지와 전체 의존성 오프라인 다운로더'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시');

// download/resolve 공통 옵션
const withFetchOptions = (command: Command): Command =>
  command
    .requiredOption('-p, --package <id>', '패키지 id')
    .option('-V, --pkg-version <version>', '패키지 버전 (생략 시 최신 버전)')
    .option('--prerelease', '프리릴리스 버전 포함')
    .option('--no-prerelease', '프리릴리스 버전 제외')
    .option('-o, --output <path>', '다운로드 경로 (기본: 설정의 downloadDir)')
    .option('-f, --framework <framework...>', '허용 프레임워크 식별자 (예: .NETStandard)')
    .option('-s, --source <url>', 'NuGet V3 service index URL');

// download 명령어
withFetchOptions(
  program.command('download').description('패키지와 의존성 다운로드')
).action(async (options: FetchCommandOptions) => {
  const { downloadCommand } = await import('./commands/download');
  await downloadCommand(options);
});

// resolve 명령어
withFetchOptions(
  program.command('resolve').description('다운로드 없이 의존성 클로저 표시')
).action(async (options: FetchCommandOptions) => {
  const { resolveCommand } = await import('./commands/resolve');
  await resolveCommand(options);
});

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(async (key?: string) => {
        const { configGet } = await import('./commands/config');
        await configGet(key);
      })
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값 (배열은 쉼표로 구분)')
      .action(async (key: string, value: string) => {
        const { configSet } = await import('./commands/config');
        await configSet(key, value);
      })
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(async () => {
        const { configList } = await import('./commands/config');
        await configList();
      })
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(async () => {
        const { configReset } = await import('./commands/config');
        await configReset();
      })
  );

// 에러 핸들링
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`오류: ${err.message}`));
  process.exit(1);
});

// 명령어가 없으면 도움말 표시
if (process.argv.length <= 2) {
  console.log(chalk.cyan('\n  nupkg-fetch - NuGet 패키지와 전체 의존성 오프라인 다운로더\n'));
  console.log('  사용법: nupkg-fetch <명령어> [옵션]\n');
  console.log('  명령어:');
  console.log('    download    패키지와 의존성 다운로드');
  console.log('    resolve     의존성 클로저 표시');
  console.log('    config      설정 관리');
  console.log('\n  예시:');
  console.log(chalk.gray('    nupkg-fetch download -p Newtonsoft.Json -V 13.0.3'));
  console.log(chalk.gray('    nupkg-fetch download -p Serilog -f .NETStandard -o ./offline'));
  console.log(chalk.gray('    nupkg-fetch resolve -p Microsoft.Extensions.Logging --prerelease'));
  console.log('\n  자세한 내용: nupkg-fetch --help\n');
} else {
  // 파싱 및 실행
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red(`오류: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
}
