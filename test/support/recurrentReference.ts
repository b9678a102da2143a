// Step-by-step GRU and LSTM over flat row-major arrays, following the
// operator definitions directly. Used to check the unrolled networks.

export interface RecurrentCase {
  seqLength: number;
  batch: number;
  inputSize: number;
  hiddenSize: number;
  numDirections: number;
  /** [seq, batch, input] */
  x: number[];
  /** [D, gates * hidden, input] */
  w: number[];
  /** [D, gates * hidden, hidden] */
  r: number[];
  /** [D, 2 * gates * hidden] */
  bias?: number[];
  /** [D, batch, hidden] */
  initialH?: number[];
  initialC?: number[];
}

const sigmoid = (x: number): number => 1 / (1 + Math.exp(-x));

/** Rows `[gate * hidden, (gate + 1) * hidden)` of `m` times `v`, for direction `d`. */
function gateProduct(m: number[], d: number, gate: number, gates: number, hidden: number, cols: number, v: number[]): number[] {
  const out = new Array<number>(hidden).fill(0);
  for (let row = 0; row < hidden; row++) {
    const base = (d * gates * hidden + gate * hidden + row) * cols;
    for (let k = 0; k < cols; k++) out[row] += m[base + k] * v[k];
  }
  return out;
}

function biasOf(c: RecurrentCase, d: number, gates: number, which: 0 | 1, gate: number): number[] {
  const h = c.hiddenSize;
  if (c.bias === undefined) return new Array<number>(h).fill(0);
  const base = d * 2 * gates * h + which * gates * h + gate * h;
  return c.bias.slice(base, base + h);
}

function stateOf(values: number[] | undefined, c: RecurrentCase, d: number, b: number): number[] {
  const h = c.hiddenSize;
  if (values === undefined) return new Array<number>(h).fill(0);
  const base = (d * c.batch + b) * h;
  return values.slice(base, base + h);
}

function add(...vs: number[][]): number[] {
  return vs[0].map((_, i) => vs.reduce((total, v) => total + v[i], 0));
}

function stepInput(c: RecurrentCase, t: number, b: number): number[] {
  const base = (t * c.batch + b) * c.inputSize;
  return c.x.slice(base, base + c.inputSize);
}

/** Runs `step` over every direction and batch row, collecting Y `[seq, D, batch, hidden]` and the final states. */
function unroll(
  c: RecurrentCase,
  initial: (d: number, b: number) => number[][],
  step: (d: number, x: number[], state: number[][]) => number[][],
): { y: number[]; last: number[][] } {
  const { seqLength: T, batch: B, hiddenSize: H, numDirections: D } = c;
  const y = new Array<number>(T * D * B * H).fill(0);
  const last: number[][] = [];
  for (let d = 0; d < D; d++) {
    for (let b = 0; b < B; b++) {
      let state = initial(d, b);
      for (let s = 0; s < T; s++) {
        const t = d === 1 ? T - 1 - s : s;
        state = step(d, stepInput(c, t, b), state);
        state[0].forEach((v, i) => (y[((t * D + d) * B + b) * H + i] = v));
      }
      state.forEach((values, k) => {
        last[k] ??= new Array<number>(D * B * H).fill(0);
        values.forEach((v, i) => (last[k][(d * B + b) * H + i] = v));
      });
    }
  }
  return { y, last };
}

export function gruReference(c: RecurrentCase, linearBeforeReset: boolean): { y: number[]; yh: number[] } {
  const { inputSize: E, hiddenSize: H } = c;
  const { y, last } = unroll(
    c,
    (d, b) => [stateOf(c.initialH, c, d, b)],
    (d, x, [hPrev]) => {
      const z = add(gateProduct(c.w, d, 0, 3, H, E, x), gateProduct(c.r, d, 0, 3, H, H, hPrev), biasOf(c, d, 3, 0, 0), biasOf(c, d, 3, 1, 0)).map(sigmoid);
      const r = add(gateProduct(c.w, d, 1, 3, H, E, x), gateProduct(c.r, d, 1, 3, H, H, hPrev), biasOf(c, d, 3, 0, 1), biasOf(c, d, 3, 1, 1)).map(sigmoid);
      const xh = gateProduct(c.w, d, 2, 3, H, E, x);
      let hh: number[];
      if (linearBeforeReset) {
        const projected = add(gateProduct(c.r, d, 2, 3, H, H, hPrev), biasOf(c, d, 3, 1, 2));
        hh = add(xh, projected.map((v, i) => r[i] * v), biasOf(c, d, 3, 0, 2)).map(Math.tanh);
      } else {
        const gated = hPrev.map((v, i) => r[i] * v);
        hh = add(xh, gateProduct(c.r, d, 2, 3, H, H, gated), biasOf(c, d, 3, 1, 2), biasOf(c, d, 3, 0, 2)).map(Math.tanh);
      }
      return [hh.map((v, i) => (1 - z[i]) * v + z[i] * hPrev[i])];
    },
  );
  return { y, yh: last[0] };
}

export function lstmReference(c: RecurrentCase): { y: number[]; yh: number[]; yc: number[] } {
  const { inputSize: E, hiddenSize: H } = c;
  const gate = (d: number, g: number, x: number[], hPrev: number[]): number[] =>
    add(gateProduct(c.w, d, g, 4, H, E, x), gateProduct(c.r, d, g, 4, H, H, hPrev), biasOf(c, d, 4, 0, g), biasOf(c, d, 4, 1, g));
  const { y, last } = unroll(
    c,
    (d, b) => [stateOf(c.initialH, c, d, b), stateOf(c.initialC, c, d, b)],
    (d, x, [hPrev, cPrev]) => {
      const i = gate(d, 0, x, hPrev).map(sigmoid);
      const o = gate(d, 1, x, hPrev).map(sigmoid);
      const f = gate(d, 2, x, hPrev).map(sigmoid);
      const candidate = gate(d, 3, x, hPrev).map(Math.tanh);
      const cell = cPrev.map((v, k) => f[k] * v + i[k] * candidate[k]);
      return [cell.map((v, k) => o[k] * Math.tanh(v)), cell];
    },
  );
  return { y, yh: last[0], yc: last[1] };
}
