export { type FetchFn, type JsonResponse, type PostJsonOptions, postJson } from "./json-client.js";
