// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { StoreError, StoredRecordInvalidError, describeError } from '../../../common/src/errors';

/**
 * Store failures surface as server errors, never as a missing package.
 */
@Catch(StoreError)
export class StoreErrorFilter implements ExceptionFilter<StoreError> {
  private readonly logger = new Logger(StoreErrorFilter.name);

  catch(exception: StoreError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const status =
      exception instanceof StoredRecordInvalidError
        ? HttpStatus.INTERNAL_SERVER_ERROR
        : HttpStatus.SERVICE_UNAVAILABLE;

    this.logger.error(`Store request failed: ${describeError(exception)}`);
    response.status(status).json({ error: exception.message });
  }
}
