import { AxiosHeaders, type AxiosResponse } from 'axios';

/**
 * Minimal successful axios response for mocked requests.
 */
export function okResponse<T>(data: T): AxiosResponse<T> {
  return {
    data,
    status: 200,
    statusText: 'OK',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}
