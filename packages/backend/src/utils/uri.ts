/**
 * 上游地址处理工具
 */

const USERINFO_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*:\/\/)[^@/?#]*@/;

/**
 * 去除地址中的凭据部分（user:pass@），其余部分保持原样
 */
export function sanitizeUri(uri: string): string {
  return uri.replace(USERINFO_PATTERN, '$1');
}

/**
 * 根据地址中嵌入的 basic auth 凭据生成请求头
 * 地址无凭据或无法解析时返回空对象
 */
export function headersForBasicAuth(uri: string): Record<string, string> {
  let parsed: URL;
  try {
    parsed = new URL(uri);
  } catch {
    return {};
  }

  if (!parsed.username && !parsed.password) {
    return {};
  }

  const username = decodeURIComponent(parsed.username);
  const password = decodeURIComponent(parsed.password);
  const token = Buffer.from(`${username}:${password}`).toString('base64');
  return { Authorization: `Basic ${token}` };
}

/** 代理路由前缀 */
export const PROXY_PREFIX = '/proxy/alertmanager';

/**
 * 经由本服务代理时下发给浏览器的上游地址
 */
export function proxyPath(name: string): string {
  return `${PROXY_PREFIX}/${encodeURIComponent(name)}`;
}

/**
 * 拼接上游 API 路径，去除基础地址末尾的斜杠
 */
export function joinUri(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
