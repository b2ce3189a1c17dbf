import { EndpointType } from './interfaces/rate-limiter.interface.js';

/**
 * Map a request to its rate limit category. Total: anything unrecognised is `general`.
 *
 * - `POST .../messages` (but not `.../messages/{id}/...`) sends mail
 * - any path under `/statistics/` queries statistics
 */
export function classifyEndpoint(method: string, path: string): EndpointType {
  const queryStart = path.indexOf('?');
  const pathname = queryStart >= 0 ? path.slice(0, queryStart) : path;

  if (
    method.toUpperCase() === 'POST' &&
    pathname.includes('/messages') &&
    !pathname.includes('/messages/')
  ) {
    return EndpointType.SendMessage;
  }

  if (pathname.includes('/statistics/')) {
    return EndpointType.Statistics;
  }

  return EndpointType.General;
}
