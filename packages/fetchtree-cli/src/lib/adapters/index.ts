export { createNodeFetchHttpClient } from "./node-fetch-http.js";
