/**
 * Split CSV text into rows of raw cells. Quoted cells may hold commas, newlines and
 * doubled quotes. Carriage returns outside quotes are dropped, as are a leading BOM
 * and a final empty line.
 */
export function parseCsvRaw(csvText: string): string[][] {
  const text = csvText.replace(/^\uFEFF/, "");
  const rows: string[][] = [];
  let current: string[] = [];
  let field = "";
  let inQuotes = false;

  const pushField = () => {
    current.push(field);
    field = "";
  };
  const pushRow = () => {
    rows.push(current);
    current = [];
  };

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inQuotes) {
      if (c !== `"`) field += c;
      else if (text[i + 1] === `"`) field += text[++i];
      else inQuotes = false;
      continue;
    }
    switch (c) {
      case `"`:
        inQuotes = true;
        break;
      case ",":
        pushField();
        break;
      case "\n":
        pushField();
        pushRow();
        break;
      case "\r":
        break;
      default:
        field += c;
    }
  }
  pushField();
  pushRow();
  if (rows.length && rows[rows.length - 1].every((v) => v === "")) rows.pop();
  return rows;
}
