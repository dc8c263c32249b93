// Basic type declarations for jstat
// Place this in src/types/jstat.d.ts

declare module 'jstat' {
  export interface jStat {
    binomial: {
      pdf(k: number, n: number, p: number): number;
      cdf(k: number, n: number, p: number): number;
    };

    // Special functions
    gammaln(x: number): number;
  }

  const jStat: jStat;
  export default jStat;
}
