export { corsConfig } from "./cors.js";
