import { applyError, type HttpResponse } from "../http/response.js";
import type { HttpRequest } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import { getMimeType } from "./mime-types.js";
import type { RequestHandler } from "./router.js";

export interface StaticFileHandlerOptions {
  filePath: string;
  fs: IFileSystem;
}

/**
 * Serves one file for one route. A missing path, or one that is not a
 * regular file, gets the HTML 404 page. Read errors propagate and become
 * a 500.
 */
export class StaticFileHandler implements RequestHandler {
  private readonly filePath: string;
  private readonly fs: IFileSystem;

  constructor(options: StaticFileHandlerOptions) {
    this.filePath = options.filePath;
    this.fs = options.fs;
  }

  async handle(_request: HttpRequest, response: HttpResponse): Promise<void> {
    if (await this.isServable()) {
      const data = await this.fs.readFile(this.filePath);
      response.setContent(data, getMimeType(this.filePath));
      return;
    }

    applyError(response, 404);
  }

  private async isServable(): Promise<boolean> {
    if (!(await this.fs.exists(this.filePath))) {
      return false;
    }
    const stat = await this.fs.stat(this.filePath);
    return stat.isFile;
  }
}
