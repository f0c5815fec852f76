// bmp-js ships no type declarations.
declare module 'bmp-js' {
  namespace bmp {
    interface BmpImage {
      width: number;
      height: number;
      /** Four bytes per pixel, in A, B, G, R order. */
      data: Buffer;
    }

    function decode(data: Buffer): BmpImage;
    function encode(image: BmpImage, quality?: number): BmpImage;
  }

  export = bmp;
}
