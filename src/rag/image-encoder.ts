import { createCanvas } from "@napi-rs/canvas";

export interface RawImage {
  data: Uint8ClampedArray;
  width: number;
  height: number;
  /** 1 = gray, 3 = RGB, anything else RGBA */
  channels: number;
}

export function toRgba(image: RawImage): Uint8ClampedArray {
  if (image.channels !== 1 && image.channels !== 3) return image.data;

  const pixels = image.width * image.height;
  const rgba = new Uint8ClampedArray(pixels * 4);
  for (let p = 0; p < pixels; p++) {
    if (image.channels === 1) {
      const v = image.data[p];
      rgba[p * 4] = v;
      rgba[p * 4 + 1] = v;
      rgba[p * 4 + 2] = v;
    } else {
      rgba[p * 4] = image.data[p * 3];
      rgba[p * 4 + 1] = image.data[p * 3 + 1];
      rgba[p * 4 + 2] = image.data[p * 3 + 2];
    }
    rgba[p * 4 + 3] = 255;
  }
  return rgba;
}

export async function encodePng(image: RawImage): Promise<Uint8Array> {
  const canvas = createCanvas(image.width, image.height);
  const ctx = canvas.getContext("2d");
  const imageData = ctx.createImageData(image.width, image.height);
  imageData.data.set(toRgba(image));
  ctx.putImageData(imageData, 0, 0);
  const png = await canvas.encode("png");
  return new Uint8Array(png);
}
