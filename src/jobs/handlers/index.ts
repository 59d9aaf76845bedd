export { DigestHandler } from "./digest.js";
