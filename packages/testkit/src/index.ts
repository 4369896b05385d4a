export { createTempDir, removeDir } from "./fs.js";
