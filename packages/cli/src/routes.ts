import {
  type IFileSystem,
  Router,
  StaticFileHandler,
} from "@minihttpd/engine";
import type { StaticRoute } from "./args.js";

export const GREETING_HTML =
  "<html><body><h1>Hello, World!</h1><p>Welcome to minihttpd</p></body></html>";

export const DEMO_JSON = '{"message": "This is JSON data"}';

export interface RouteOptions {
  demo: boolean;
  statics: StaticRoute[];
  /** Directory holding the demo `index.html`. */
  publicDir: string;
}

export function buildRouter(options: RouteOptions, fs: IFileSystem): Router {
  const router = new Router();

  if (options.demo) {
    router
      .register("/", (_req, res) => {
        res.setContent(GREETING_HTML);
      })
      .register("/api/data", (_req, res) => {
        res.setContent(DEMO_JSON, "application/json");
      })
      .register(
        "/index.html",
        new StaticFileHandler({
          filePath: `${options.publicDir}/index.html`,
          fs,
        }),
      );
  }

  // Registered after the demo routes so --static can replace them.
  for (const route of options.statics) {
    router.register(
      route.urlPath,
      new StaticFileHandler({ filePath: route.filePath, fs }),
    );
  }

  return router;
}
