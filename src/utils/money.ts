export function roundMoney(value: number) {
  return Math.round(value * 100) / 100;
}

export function lineTotal(line: { quantity: number; price: number }) {
  return roundMoney(line.quantity * line.price);
}

export function sumTotals(lines: { quantity: number; price: number }[]) {
  return roundMoney(lines.reduce((sum, line) => sum + line.quantity * line.price, 0));
}
