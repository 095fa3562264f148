const formatters = new Map<number, Intl.NumberFormat>();

function formatterFor(digits: number): Intl.NumberFormat {
  let f = formatters.get(digits);
  if (!f) {
    f = new Intl.NumberFormat("en-US", {
      minimumFractionDigits: digits,
      maximumFractionDigits: digits,
      // Ties go to even, judged on the exact binary value
      roundingMode: "halfEven",
      useGrouping: false
    });
    formatters.set(digits, f);
  }
  return f;
}

export function fmtFixed(n: number, digits = 4) {
  return formatterFor(digits).format(n);
}

// Chart labels and legends
export function fmtShort(n: number) {
  return fmtFixed(n, 2);
}
