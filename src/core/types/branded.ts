/**
 * Branded types for values validated once at the edges.
 */

declare const NonEmptyStringBrand: unique symbol
declare const GithubRepoBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

export type NonEmptyString = Brand<string, typeof NonEmptyStringBrand>

/** `owner/repo` slug as accepted by the GitHub REST API. */
export type GithubRepo = Brand<string, typeof GithubRepoBrand>
