export { HttpClient, HttpRequest, HttpResponse } from "./types";
export { FetchHttpClient, FetchLike, FetchInit, FetchResponseLike, BodyReaderLike } from "./fetchHttpClient";
export { readLines, readText } from "./lines";
