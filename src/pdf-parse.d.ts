// The package's main entry runs a self-test when loaded as an ES module;
// the library file is the same function without it.
declare module "pdf-parse/lib/pdf-parse.js" {
  import pdfParse from "pdf-parse";
  export default pdfParse;
}
