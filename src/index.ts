export { ABSENT, isAbsent } from './mapping/absent';
export type { Absent } from './mapping/absent';
export { ClassRegistry } from './mapping/registry';
export { TemplateDefaults } from './mapping/template';
export type { DefaultValueProvider } from './mapping/template';
export { coerce, formatDate, formatValue, parseDate, isParamType, PARAM_TYPES } from './mapping/coercion';

export { ApiRequest, requestTemplates } from './request/apiRequest';
export { appendQuery, buildQueryPairs, encodePairs, isQuerySource, renderQuery } from './request/queryBuilder';
export type { QueryPair } from './request/queryBuilder';

export { ApiResponse, isResponseClass, parseResponse } from './response/apiResponse';

export { XmlElement, parseXmlDocument } from './parsers/xmlParser';
export { DomNode, parseDomDocument } from './parsers/domParser';

export { Service } from './service/service';
export type { ServiceLogger, ServiceOptions } from './service/service';
export { AxiosTransport } from './service/transport';
export type { AxiosTransportOptions, Transport, TransportResponse } from './service/transport';

export { DEFAULT_SERVICE_CONFIG, loadServiceConfig } from './config/serviceConfig';
export type { HttpMethod, ServiceConfig } from './config/serviceConfig';

export * from './errors';
export type * from './types/param';
export type * from './types/node';
