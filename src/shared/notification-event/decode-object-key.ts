const escapedRun = /(?:%[0-9a-fA-F]{2})+/g;

// s3 notification keys are form encoded (`+` for a space, `%3D` for `=`)
export function decodeObjectKey(encodedKey: string): string {
  return encodedKey
    .replace(/\+/g, ' ')
    .replace(escapedRun, (run) =>
      Buffer.from(run.replace(/%/g, ''), 'hex').toString('utf8')
    );
}
