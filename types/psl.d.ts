// psl and the userland punycode package ship without typings; only the calls
// made for apex extraction are declared.
declare module 'psl' {
  interface ParsedDomain {
    input: string;
    tld: string | null;
    sld: string | null;
    domain: string | null;
    subdomain: string | null;
    listed: boolean;
  }
  interface ParseError {
    input: string;
    error: { code: string; message: string };
  }
  const psl: {
    parse(domain: string): ParsedDomain | ParseError;
  };
  export default psl;
}

declare module 'punycode/' {
  function toASCII(domain: string): string;
  function toUnicode(domain: string): string;
}
