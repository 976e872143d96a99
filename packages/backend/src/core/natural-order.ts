/**
 * 自然排序比较器
 *
 * 字符串中的连续数字按数值比较（"v2" < "v10"），其余字符按码元比较。
 * 数字优先于非数字字符；数值相同时前导零较少者在前；
 * 全部相同时较短的字符串在前。
 */

function isDigit(code: number): boolean {
  return code >= 48 && code <= 57;
}

const ZERO = 48;

/**
 * @returns 负数表示 a 在前，正数表示 b 在前，0 表示相同
 */
export function naturalCompare(a: string, b: string): number {
  let i = 0;
  let j = 0;

  while (i < a.length && j < b.length) {
    const ca = a.charCodeAt(i);
    const cb = b.charCodeAt(j);
    const digitA = isDigit(ca);
    const digitB = isDigit(cb);

    if (digitA !== digitB) {
      return digitA ? -1 : 1;
    }

    if (!digitA) {
      if (ca !== cb) {
        return ca < cb ? -1 : 1;
      }
      i++;
      j++;
      continue;
    }

    // 跳过前导零
    const zerosStartA = i;
    const zerosStartB = j;
    while (i < a.length && a.charCodeAt(i) === ZERO) i++;
    while (j < b.length && b.charCodeAt(j) === ZERO) j++;
    const zerosA = i - zerosStartA;
    const zerosB = j - zerosStartB;

    const runStartA = i;
    const runStartB = j;
    while (i < a.length && isDigit(a.charCodeAt(i))) i++;
    while (j < b.length && isDigit(b.charCodeAt(j))) j++;

    // 有效位数不同时，位数少的数值更小
    const lengthA = i - runStartA;
    const lengthB = j - runStartB;
    if (lengthA !== lengthB) {
      return lengthA < lengthB ? -1 : 1;
    }

    // 位数相同，逐字符比较即为数值比较
    const runA = a.slice(runStartA, i);
    const runB = b.slice(runStartB, j);
    if (runA !== runB) {
      return runA < runB ? -1 : 1;
    }

    if (zerosA !== zerosB) {
      return zerosA < zerosB ? -1 : 1;
    }
  }

  const restA = a.length - i;
  const restB = b.length - j;
  if (restA !== restB) {
    return restA < restB ? -1 : 1;
  }
  return 0;
}
