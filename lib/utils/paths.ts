import type { HttpScope, WebsocketScope } from '../types/Channel';

/**
 * Path used for routing: the scope path with the mount point (`root_path`) removed
 *
 * @example
 * ```typescript
 * getRoutePath({ path: '/api/users', root_path: '/api', ... }); // '/users'
 * getRoutePath({ path: '/apiv2/users', root_path: '/api', ... }); // '/apiv2/users'
 * ```
 */
export function getRoutePath(scope: HttpScope | WebsocketScope): string {
  const { path } = scope;
  const rootPath = scope.root_path ?? '';

  if (!rootPath || !path.startsWith(rootPath)) {
    return path;
  }

  if (path === rootPath) {
    return '';
  }

  if (path[rootPath.length] === '/') {
    return path.slice(rootPath.length);
  }

  return path;
}
