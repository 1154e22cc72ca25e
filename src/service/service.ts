import { HttpMethod, ServiceConfig, loadServiceConfig } from '../config/serviceConfig';
import { parseXmlDocument } from '../parsers/xmlParser';
import { appendQuery } from '../request/queryBuilder';
import type { ApiRequest } from '../request/apiRequest';
import { ApiResponse, parseResponse } from '../response/apiResponse';
import type { DocumentParser } from '../types/node';
import type { ResponseClass } from '../types/param';
import { AxiosTransport, Transport } from './transport';

export type ServiceLogger = Pick<Console, 'log' | 'error'>;

export interface ServiceOptions {
  transport?: Transport;
  parseDocument?: DocumentParser;
  method?: HttpMethod;
  config?: ServiceConfig;
  logger?: ServiceLogger;
}

/**
 * One API endpoint. Renders requests, hands them to the transport and maps
 * the XML body onto a response class. Transport and parse failures reach the
 * caller unchanged.
 */
export class Service {
  private readonly transport: Transport;
  private readonly parseDocument: DocumentParser;
  private readonly method: HttpMethod;
  private readonly logRequests: boolean;
  private readonly logger: ServiceLogger;

  constructor(
    public readonly endpoint: string,
    options: ServiceOptions = {},
  ) {
    const config = options.config ?? loadServiceConfig();
    this.transport =
      options.transport ?? new AxiosTransport({ timeoutMs: config.timeoutMs, userAgent: config.userAgent });
    this.parseDocument = options.parseDocument ?? parseXmlDocument;
    this.method = options.method ?? config.method;
    this.logRequests = config.logRequests;
    this.logger = options.logger ?? console;
  }

  url(request: ApiRequest): string {
    return request.toUrl(this.endpoint);
  }

  async call<T extends ApiResponse>(request: ApiRequest, responseClass: ResponseClass<T>): Promise<T> {
    const query = request.render();
    const url = this.method === 'GET' ? appendQuery(this.endpoint, query) : this.endpoint;
    const body = this.method === 'POST' ? query : undefined;

    if (this.logRequests) {
      this.logger.log(`[Service] ${this.method} ${url}`);
    }
    const startedAt = Date.now();

    try {
      const response = await this.transport.perform(this.method, url, body);
      if (this.logRequests) {
        this.logger.log(`[Service] ${response.status} ${url} (${Date.now() - startedAt}ms)`);
      }
      return parseResponse(responseClass, this.parseDocument(response.body));
    } catch (error) {
      if (this.logRequests) {
        this.logger.error(`[Service] Request failed: ${error instanceof Error ? error.message : String(error)}`);
      }
      throw error;
    }
  }
}
