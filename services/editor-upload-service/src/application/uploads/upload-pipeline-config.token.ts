export const UPLOAD_PIPELINE_CONFIG = Symbol('UPLOAD_PIPELINE_CONFIG');
