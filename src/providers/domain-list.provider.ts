import axios from 'axios';
import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { IListSource } from './list-source.provider.interface.js';
import { config } from '../config/env.js';
import { ValidationError, ValidationErrorKind, getErrorMessage } from '../errors/validation.error.js';

/**
 * Domain List Provider
 *
 * Loads a JSON array of domain strings from a file:// URI or an http(s) URL.
 * Entries are trimmed and lower-cased; empty entries are dropped.
 */

const domainListSchema = z.array(z.string());

export interface DomainListProviderConfig {
  timeout?: number;
}

function listLoadFailure(uri: string, message: string, cause?: unknown): ValidationError {
  return new ValidationError(
    ValidationErrorKind.LIST_LOAD_FAILURE,
    message,
    { uri },
    { cause }
  );
}

export class DomainListProvider implements IListSource {
  private timeout: number;

  constructor(providerConfig: DomainListProviderConfig = {}) {
    this.timeout = providerConfig.timeout ?? config.listFetchTimeoutMs;
  }

  async fetchList(uri: string): Promise<string[]> {
    let url: URL;
    try {
      url = new URL(uri);
    } catch (error) {
      throw listLoadFailure(uri, `Invalid list URL: ${uri}`, error);
    }

    let payload: unknown;
    switch (url.protocol) {
      case 'file:':
        payload = await this.readFileList(uri, url);
        break;
      case 'http:':
      case 'https:':
        payload = await this.fetchRemoteList(uri);
        break;
      default:
        throw listLoadFailure(uri, `Unsupported list URL scheme: ${url.protocol}`);
    }

    const parsed = domainListSchema.safeParse(payload);
    if (!parsed.success) {
      throw listLoadFailure(uri, `List at ${uri} is not a JSON array of strings`, parsed.error);
    }

    return parsed.data
      .map((domain) => domain.trim().toLowerCase())
      .filter((domain) => domain.length > 0);
  }

  private async readFileList(uri: string, url: URL): Promise<unknown> {
    let contents: string;
    try {
      contents = await readFile(fileURLToPath(url), 'utf8');
    } catch (error) {
      throw listLoadFailure(uri, `Failed to read file: ${getErrorMessage(error)}`, error);
    }

    try {
      return JSON.parse(contents);
    } catch (error) {
      throw listLoadFailure(uri, `Failed to parse JSON: ${getErrorMessage(error)}`, error);
    }
  }

  private async fetchRemoteList(uri: string): Promise<unknown> {
    try {
      const response = await axios.get<unknown>(uri, {
        timeout: this.timeout,
        responseType: 'json',
        headers: { Accept: 'application/json' },
      });
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw listLoadFailure(
          uri,
          status ? `HTTP ${status} fetching ${uri}` : `Failed to fetch ${uri}: ${error.message}`,
          error
        );
      }
      throw listLoadFailure(uri, `Failed to fetch ${uri}: ${getErrorMessage(error)}`, error);
    }
  }
}

export const domainListProvider = new DomainListProvider();
