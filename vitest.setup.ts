import { initLogger } from "@service-wizard/core";

initLogger({ silent: true, logToFile: false });
