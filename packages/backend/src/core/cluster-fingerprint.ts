import crypto from 'crypto';

/**
 * 集群指纹计算失败
 */
export class ClusterFingerprintError extends Error {
  readonly code = 'CLUSTER_FINGERPRINT_FAILED';

  constructor(message: string, readonly cause?: unknown) {
    super(message);
    this.name = 'ClusterFingerprintError';
    Object.setPrototypeOf(this, ClusterFingerprintError.prototype);
  }
}

/**
 * 根据集群成员名计算集群指纹（SHA-1 十六进制）
 *
 * 按传入顺序拼接成员名，不做排序：
 * 需要跨上游稳定的指纹时，调用方必须提供规范化的成员顺序。
 */
export function clusterFingerprint(members: readonly string[]): string {
  const hash = crypto.createHash('sha1');
  try {
    for (const member of members) {
      hash.update(member);
    }
  } catch (error) {
    throw new ClusterFingerprintError(
      `cannot fingerprint cluster members: ${error instanceof Error ? error.message : String(error)}`,
      error,
    );
  }
  return hash.digest('hex');
}
