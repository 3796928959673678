import axios from "axios";
import { Headers, HttpProviderConnector, QueryParams } from "./http-provider.connector";

const DEFAULT_TIMEOUT_MS = 10_000;

export class AxiosProviderConnector implements HttpProviderConnector {
  constructor(private readonly timeoutMs = DEFAULT_TIMEOUT_MS) {}

  async get<T>(url: string, headers: Headers, params?: QueryParams): Promise<T> {
    const res = await axios.get<T>(url, {
      headers,
      params,
      timeout: this.timeoutMs,
    });

    return res.data;
  }
}
