export { HashMap } from "./hash-map.js";
