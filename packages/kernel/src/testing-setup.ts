import { Logger } from "./logger.js";

Logger.configure({ level: "silent" });
