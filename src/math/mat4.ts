/**
 * 4x4 matrices for the tile camera
 *
 * Column-major (WebGL convention):
 * [0]  [4]  [8]  [12]
 * [1]  [5]  [9]  [13]
 * [2]  [6]  [10] [14]
 * [3]  [7]  [11] [15]
 *
 * Only what an orthographic 2D camera needs: an ortho projection, a
 * translation for the camera position, and point transforms.
 */

export type Mat4 = Float32Array;

/** 3D point as [x, y, z] tuple */
export type Vec3 = [number, number, number];

/** Box mapped to clip space by `ortho`, in world units */
export interface OrthoBox {
  left: number;
  right: number;
  bottom: number;
  top: number;
  near: number;
  far: number;
}

export function create(): Mat4 {
  return new Float32Array([
    1, 0, 0, 0,
    0, 1, 0, 0,
    0, 0, 1, 0,
    0, 0, 0, 1,
  ]);
}

/** Multiply two matrices: out = a * b */
export function multiply(a: Mat4, b: Mat4): Mat4 {
  const out = new Float32Array(16);
  for (let col = 0; col < 4; col++) {
    for (let row = 0; row < 4; row++) {
      let sum = 0;
      for (let k = 0; k < 4; k++) {
        sum += a[k * 4 + row]! * b[col * 4 + k]!;
      }
      out[col * 4 + row] = sum;
    }
  }
  return out;
}

/** Translation matrix; z defaults to 0 for 2D camera offsets */
export function translate(x: number, y: number, z: number = 0): Mat4 {
  const out = create();
  out.set([x, y, z], 12);
  return out;
}

/**
 * Orthographic projection of `box` onto clip space [-1, 1].
 *
 * With `reverseDepth` the near plane maps to depth 1 and the far plane to
 * -1, for pipelines that clear depth to 0 and test with greater-than.
 *
 * @throws Error if the box has zero extent on any axis
 */
export function ortho(box: OrthoBox, reverseDepth: boolean = false): Mat4 {
  const { left, right, bottom, top } = box;
  const near = reverseDepth ? box.far : box.near;
  const far = reverseDepth ? box.near : box.far;

  if (left === right || bottom === top || near === far) {
    throw new Error(
      `Degenerate orthographic box: x [${left}, ${right}], y [${bottom}, ${top}], z [${box.near}, ${box.far}]`
    );
  }

  const width = right - left;
  const height = top - bottom;
  const depth = far - near;

  const out = new Float32Array(16);
  out[0] = 2 / width;
  out[5] = 2 / height;
  out[10] = -2 / depth;
  out[12] = -(right + left) / width;
  out[13] = -(top + bottom) / height;
  out[14] = -(far + near) / depth;
  out[15] = 1;
  return out;
}

/** Transform a point by a Mat4 (w = 1), with perspective divide */
export function transformPoint(m: Mat4, v: Vec3): Vec3 {
  const [x, y, z] = v;
  const w = m[3]! * x + m[7]! * y + m[11]! * z + m[15]!;
  const invW = w ? 1 / w : 1;

  return [
    (m[0]! * x + m[4]! * y + m[8]! * z + m[12]!) * invW,
    (m[1]! * x + m[5]! * y + m[9]! * z + m[13]!) * invW,
    (m[2]! * x + m[6]! * y + m[10]! * z + m[14]!) * invW,
  ];
}
