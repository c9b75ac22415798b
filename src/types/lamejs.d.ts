// lamejs ships no type declarations.
declare module 'lamejs' {
  namespace lamejs {
    class Mp3Encoder {
      constructor(channels: number, sampleRate: number, kbps: number);
      encodeBuffer(left: Int16Array, right?: Int16Array): Int8Array;
      flush(): Int8Array;
    }
  }
  export = lamejs;
}
