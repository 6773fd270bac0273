export {
  TOKEN_ENV,
  readTokenFile,
  writeTokenFile,
  resolveToken,
} from "./token-file.js";
