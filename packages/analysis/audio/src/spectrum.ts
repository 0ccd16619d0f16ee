/**
 * 実数入力のスペクトル変換
 * 長さが2の累乗なら基数2 FFT、それ以外は直接 DFT
 * 戻り値は k = 0..floor(N/2) の振幅 |X[k]|
 */
export function magnitudeSpectrum(frame: Float64Array): Float64Array {
  const n = frame.length;
  if (n === 0) return new Float64Array(0);
  return isPowerOfTwo(n) ? fftMagnitudes(frame) : dftMagnitudes(frame);
}

/**
 * ビン k の中心周波数（Hz）
 */
export function binFrequency(k: number, frameLength: number, sampleRate: number): number {
  return (k * sampleRate) / frameLength;
}

export function isPowerOfTwo(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

function fftMagnitudes(frame: Float64Array): Float64Array {
  const n = frame.length;
  const re = Float64Array.from(frame);
  const im = new Float64Array(n);

  // ビット反転並べ替え
  for (let i = 1, j = 0; i < n; i++) {
    let bit = n >> 1;
    for (; j & bit; bit >>= 1) {
      j ^= bit;
    }
    j ^= bit;
    if (i < j) {
      const tmp = re[i];
      re[i] = re[j];
      re[j] = tmp;
    }
  }

  for (let len = 2; len <= n; len <<= 1) {
    const half = len >> 1;
    const step = (-2 * Math.PI) / len;
    for (let start = 0; start < n; start += len) {
      for (let k = 0; k < half; k++) {
        const wRe = Math.cos(step * k);
        const wIm = Math.sin(step * k);
        const a = start + k;
        const b = a + half;
        const bRe = re[b] * wRe - im[b] * wIm;
        const bIm = re[b] * wIm + im[b] * wRe;
        re[b] = re[a] - bRe;
        im[b] = im[a] - bIm;
        re[a] += bRe;
        im[a] += bIm;
      }
    }
  }

  const bins = Math.floor(n / 2) + 1;
  const magnitudes = new Float64Array(bins);
  for (let k = 0; k < bins; k++) {
    magnitudes[k] = Math.hypot(re[k], im[k]);
  }
  return magnitudes;
}

function dftMagnitudes(frame: Float64Array): Float64Array {
  const n = frame.length;
  const bins = Math.floor(n / 2) + 1;
  const magnitudes = new Float64Array(bins);

  for (let k = 0; k < bins; k++) {
    let real = 0;
    let imag = 0;
    for (let t = 0; t < n; t++) {
      const angle = (-2 * Math.PI * k * t) / n;
      real += frame[t] * Math.cos(angle);
      imag += frame[t] * Math.sin(angle);
    }
    magnitudes[k] = Math.hypot(real, imag);
  }

  return magnitudes;
}
