export type Headers = Record<string, string>;

export type QueryParams = Record<string, string>;

export interface HttpProviderConnector {
  get<T>(url: string, headers: Headers, params?: QueryParams): Promise<T>;
}
