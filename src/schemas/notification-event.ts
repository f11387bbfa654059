export const eventSchema = {
  type: 'object',
  required: ['Records'],
  properties: {
    Records: {
      type: 'array',
      minItems: 1,
    },
  },
};

// only the first record of an event is read so only it is checked
export const recordSchema = {
  type: 'object',
  required: ['s3'],
  properties: {
    s3: {
      type: 'object',
      required: ['bucket', 'object'],
      properties: {
        bucket: {
          type: 'object',
          required: ['name'],
          properties: {
            name: { type: 'string', minLength: 1 },
          },
        },
        object: {
          type: 'object',
          required: ['key'],
          properties: {
            key: { type: 'string', minLength: 1 },
          },
        },
      },
    },
  },
};
