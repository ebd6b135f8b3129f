import { DecryptCommand, KMSClient } from '@aws-sdk/client-kms';
import { Decrypter } from './types';

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

export function isBase64(value: string): boolean {
  return value.length % 4 === 0 && BASE64_PATTERN.test(value);
}

export function createKmsDecrypter(client: KMSClient = new KMSClient({})): Decrypter {
  return {
    async decrypt(ciphertext: string): Promise<string> {
      const output = await client.send(
        new DecryptCommand({
          CiphertextBlob: Buffer.from(ciphertext, 'base64'),
        })
      );

      if (!output.Plaintext) {
        throw new Error('KMS Decrypt returned no plaintext');
      }

      return Buffer.from(output.Plaintext).toString('utf8');
    },
  };
}
