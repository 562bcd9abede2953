import { registerAs } from '@nestjs/config';

export const SIGNING_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;

export type SigningAlgorithm = (typeof SIGNING_ALGORITHMS)[number];

export interface JwtConfig {
  secret: string;
  algorithm: SigningAlgorithm;
  expiresInMinutes: number;
}

export function isSigningAlgorithm(value: unknown): value is SigningAlgorithm {
  return SIGNING_ALGORITHMS.some(algorithm => algorithm === value);
}

export default registerAs('jwt', (): JwtConfig => {
  const algorithm = process.env.JWT_ALGORITHM;

  return {
    secret: process.env.JWT_SECRET_KEY ?? '',
    algorithm: isSigningAlgorithm(algorithm) ? algorithm : 'HS256',
    expiresInMinutes: parseInt(process.env.ACCESS_TOKEN_EXPIRE_MINUTES ?? '60', 10),
  };
});
