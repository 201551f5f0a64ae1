import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from "@nestjs/common"
import type { Request } from "express"
import * as fs from "fs"
import { Observable, catchError, throwError } from "rxjs"

/**
 * Deletes the stored upload when the request fails after multer wrote it,
 * e.g. a body that fails validation or a workflow that could not start
 */
@Injectable()
export class UploadCleanupInterceptor implements NestInterceptor {
  private readonly logger = new Logger(UploadCleanupInterceptor.name)

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>()

    return next.handle().pipe(
      catchError((error: unknown) => {
        const uploadPath = request.file?.path
        if (uploadPath) {
          try {
            fs.rmSync(uploadPath, { force: true })
            this.logger.log(`Removed upload of failed request: ${uploadPath}`)
          } catch (rmError) {
            this.logger.warn(`Could not remove upload ${uploadPath}: ${rmError instanceof Error ? rmError.message : String(rmError)}`)
          }
        }
        return throwError(() => error)
      }),
    )
  }
}
