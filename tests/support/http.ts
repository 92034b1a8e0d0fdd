import { AxiosError, AxiosHeaders, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";

function requestConfig(url: string): InternalAxiosRequestConfig {
  return { url, headers: new AxiosHeaders() };
}

export function okResponse<T>(data: T, url = "https://example.com/resource"): AxiosResponse<T> {
  return {
    status: 200,
    statusText: "OK",
    headers: {},
    config: requestConfig(url),
    data
  };
}

export function statusError(status: number, statusText: string, url = "https://example.com/resource"): AxiosError {
  const config = requestConfig(url);
  const failure = new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config);
  failure.response = { status, statusText, headers: {}, config, data: null };
  return failure;
}

export function networkError(code: string, message: string): AxiosError {
  return new AxiosError(message, code);
}
