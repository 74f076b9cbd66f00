/**
 * URL 生成服务
 */
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig, UrlProvider } from '../types';

@Injectable()
export class UrlProviderService implements UrlProvider {
  private readonly gitBaseUrl: string;
  private readonly uiBaseUrl: string;

  constructor(configService: ConfigService<AppConfig, true>) {
    const url = configService.get('url', { infer: true });
    this.gitBaseUrl = trimTrailingSlash(url.gitBaseUrl);
    this.uiBaseUrl = trimTrailingSlash(url.uiBaseUrl);
  }

  /**
   * 仓库克隆地址
   */
  generateRepoCloneUrl(repoPath: string): string {
    return `${this.gitBaseUrl}/${repoPath}.git`;
  }

  /**
   * 仓库页面地址
   */
  generateUiRepoUrl(repoPath: string): string {
    return `${this.uiBaseUrl}/${repoPath}`;
  }
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
