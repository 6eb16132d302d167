export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  QueryScalar,
  QueryParams,
} from './json.js';
export type {
  HttpMethod,
  AuthMethod,
  RequestOptions,
  HttpClientContract,
} from './http-client.js';
