// bplist-parser ships no type declarations.
declare module "bplist-parser" {
  const bplist: {
    parseBuffer(buffer: Buffer): unknown[];
  };
  export default bplist;
}
