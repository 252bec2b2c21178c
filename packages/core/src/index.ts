/**
 * @otc/core
 *
 * Open To Close API client: transport, validation, property field mapping
 * and one facade per resource.
 */

export * from "./services";
