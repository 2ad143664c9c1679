import { setLoggerOverride } from "../src/logging.js";

setLoggerOverride({ level: "silent" });
