export { ConfluenceClient } from "./confluence-client.js";
export type { ConfluenceClientConfig, FetchFn } from "./confluence-client.js";
export { ConfluenceLoader } from "./confluence-loader.js";
export type { ConfluenceLoaderOptions } from "./confluence-loader.js";
export { paginate } from "./pagination.js";
export type { PageWindow } from "./pagination.js";
export type {
  ConfluenceAttachment,
  ConfluencePage,
  ConfluenceSpace,
  ConfluenceUser,
} from "./schemas.js";
