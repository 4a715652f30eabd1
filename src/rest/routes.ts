/**
 * REST route templates and their compiled form.
 * The major parameter of a template splits one server bucket into an
 * independent quota per resource (per channel, per guild, per webhook).
 */

import { RouteCompileError } from '../shared/errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Placeholder groups that partition a bucket, tried in order. A group
 * applies when its first name is the first placeholder of the path and the
 * rest appear anywhere after it; its values are joined with `:`.
 */
export const MAJOR_PARAM_COMBOS: ReadonlyArray<readonly string[]> = [
  ['channel'],
  ['guild'],
  ['webhook', 'token'],
  ['webhook'],
];

/** Marker used as the major-params hash of routes without a major parameter. */
export const NO_MAJOR_PARAM = '-';

export type RouteParams = Record<string, string | number | bigint>;

const PLACEHOLDER = /\{([a-z_]+)\}/g;

/** An HTTP method plus a path pattern such as `/channels/{channel}/messages`. */
export class Route {
  readonly method: HttpMethod;
  readonly pathTemplate: string;
  readonly majorParam: string | undefined;
  /** Every placeholder that feeds the major-params hash; empty when there is none. */
  readonly majorParams: readonly string[];
  /** Identity of the template, used as the route→bucket-hash map key. */
  readonly key: string;

  constructor(method: HttpMethod, pathTemplate: string) {
    this.method = method;
    this.pathTemplate = pathTemplate;
    this.key = `${method} ${pathTemplate}`;

    const placeholders = Array.from(pathTemplate.matchAll(PLACEHOLDER), (match) => match[1]);
    const combo = MAJOR_PARAM_COMBOS.find(
      (names) => names[0] === placeholders[0] && names.every((name) => placeholders.includes(name)),
    );
    this.majorParams = combo ?? [];
    this.majorParam = combo?.[0];
  }

  /**
   * Bind every placeholder to a concrete value.
   * @throws RouteCompileError when a placeholder has no value.
   */
  compile(params: RouteParams = {}): CompiledRoute {
    const compiledPath = this.pathTemplate.replace(PLACEHOLDER, (_match, name: string) => {
      const value = params[name];
      if (value === undefined) {
        throw new RouteCompileError(this.key, name);
      }
      return encodeURIComponent(String(value));
    });

    const majorValues = this.majorParams.map((name) => String(params[name]));
    const majorParamHash = majorValues.length > 0 ? majorValues.join(':') : NO_MAJOR_PARAM;

    return new CompiledRoute(this, compiledPath, majorParamHash);
  }

  toString(): string {
    return this.key;
  }
}

/** A route bound to concrete values. */
export class CompiledRoute {
  readonly route: Route;
  readonly compiledPath: string;
  readonly majorParamHash: string;
  /** Equality key over method, compiled path and major-params hash. */
  readonly key: string;

  constructor(route: Route, compiledPath: string, majorParamHash: string) {
    this.route = route;
    this.compiledPath = compiledPath;
    this.majorParamHash = majorParamHash;
    this.key = `${route.method} ${compiledPath} ${majorParamHash}`;
  }

  get method(): HttpMethod {
    return this.route.method;
  }

  /** Key of the live bucket for a server bucket hash. */
  realBucketHash(bucketHash: string): string {
    return `${bucketHash};${this.majorParamHash}`;
  }

  createUrl(baseUrl: string): string {
    return `${baseUrl.replace(/\/+$/, '')}${this.compiledPath}`;
  }

  equals(other: CompiledRoute): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return `${this.route.method} ${this.compiledPath}`;
  }
}

// A small set of endpoints used by the library itself and its examples.
export const GET_GATEWAY_BOT = new Route('GET', '/gateway/bot');
export const GET_GATEWAY = new Route('GET', '/gateway');
export const GET_MY_USER = new Route('GET', '/users/@me');
export const GET_CHANNEL = new Route('GET', '/channels/{channel}');
export const GET_CHANNEL_MESSAGES = new Route('GET', '/channels/{channel}/messages');
export const POST_CHANNEL_MESSAGES = new Route('POST', '/channels/{channel}/messages');
export const PATCH_CHANNEL_MESSAGE = new Route('PATCH', '/channels/{channel}/messages/{message}');
export const DELETE_CHANNEL_MESSAGE = new Route('DELETE', '/channels/{channel}/messages/{message}');
export const PUT_MY_REACTION = new Route(
  'PUT',
  '/channels/{channel}/messages/{message}/reactions/{emoji}/@me',
);
export const GET_GUILD = new Route('GET', '/guilds/{guild}');
export const GET_GUILD_MEMBERS = new Route('GET', '/guilds/{guild}/members');
export const GET_GUILD_CHANNELS = new Route('GET', '/guilds/{guild}/channels');
export const POST_WEBHOOK = new Route('POST', '/webhooks/{webhook}/{token}');
