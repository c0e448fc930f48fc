const outputRef = {
  type: 'object',
  additionalProperties: false,
  required: ['resource', 'key'],
  properties: {
    resource: { type: 'string', minLength: 1 },
    key: { type: 'string', minLength: 1 }
  }
} as const

export const deployConfigSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  additionalProperties: false,
  properties: {
    $schema: { type: 'string' },
    sitePath: { type: 'string', minLength: 1 },
    outputDir: { type: 'string', minLength: 1 },
    container: { type: 'string', minLength: 1 },
    indexDocument: { type: 'string', minLength: 1 },
    errorDocument404Path: { type: 'string', minLength: 1 },
    installCommand: { type: 'string', minLength: 1 },
    buildCommand: { type: 'string', minLength: 1 },
    commandTimeoutMs: { type: 'integer', minimum: 1 },
    uploadConcurrency: { type: 'integer', minimum: 1 },
    storageOutput: outputRef,
    endpointOutput: outputRef,
    outputsFile: { type: 'string', minLength: 1 },
    outputsTimeoutMs: { type: 'integer', minimum: 0 }
  }
} as const
