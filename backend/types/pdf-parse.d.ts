// The package entry runs a debug harness when loaded outside a parent module;
// the library file underneath it has the same API.
declare module 'pdf-parse/lib/pdf-parse.js' {
    import pdfParse = require('pdf-parse');
    export = pdfParse;
}
