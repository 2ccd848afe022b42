import { setLogLevel } from "../logger";

setLogLevel("silent");
