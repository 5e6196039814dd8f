/**
 * Gatehouse - Public Routes
 * Paths that bypass IP and token authorization
 */

export class PublicRoutes {
  private routes: readonly string[];
  private baseUrl: string | undefined;

  constructor(routes: readonly string[], baseUrl?: string) {
    this.routes = routes;
    this.baseUrl = baseUrl && baseUrl !== '/' ? baseUrl.replace(/\/+$/, '') : undefined;
  }

  /**
   * Strip the mount prefix, if any, on a segment boundary
   */
  public effectivePath(path: string): string {
    const base = this.baseUrl;
    if (base === undefined) {
      return path;
    }
    if (path === base) {
      return '/';
    }
    if (path.startsWith(`${base}/`)) {
      return path.slice(base.length);
    }
    return path;
  }

  /**
   * A path is public when it equals a listed route or lies beneath one
   */
  public matches(path: string): boolean {
    const effective = this.effectivePath(path);
    return this.routes.some((route) => effective === route || effective.startsWith(`${route}/`));
  }

  public list(): readonly string[] {
    return this.routes;
  }
}

export function createPublicRoutes(routes: readonly string[], baseUrl?: string): PublicRoutes {
  return new PublicRoutes(routes, baseUrl);
}
