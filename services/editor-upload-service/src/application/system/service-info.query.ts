import { Injectable } from '@nestjs/common';

@Injectable()
export class ServiceInfoQuery {
  getInfo() {
    return {
      service: 'editor-upload-service',
      kind: 'http-upload',
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }
}
