// Core module exports for nupkg-fetch

// 실행 드라이버
export { PackageFetcher, createPackageFetcher, stopPredicateFromSignal, MESSAGES } from './packageFetcher';
export type { FetchOptions } from './packageFetcher';

// Download Orchestrator
export { DownloadOrchestrator } from './downloadOrchestrator';
export type {
  DownloadItem,
  DownloadItemStatus,
  DownloadOptions,
  DownloadResult,
  DownloadOrchestratorEvents,
} from './downloadOrchestrator';

// Downloader
export { NuGetDownloader, getNuGetDownloader } from './downloaders/nuget';
export type { NuGetDownloaderOptions } from './downloaders/nuget';

// Resolvers
export { VersionResolver, pickHighest } from './resolver/versionResolver';
export { DependencyGraphBuilder, collectDependencies } from './resolver/dependencyGraphBuilder';
export type { GraphBuildOptions, GraphBuildResult } from './resolver/dependencyGraphBuilder';

// Config
export { ConfigManager, getConfigManager, DEFAULT_CONFIG } from './config';
export type { Config, ConfigKey } from './config';

// Shared utilities
export * from './shared';

// 타입
export * from '../types';
