/** Marks a number that must go out as an OSC int32 rather than float32. */
export type OscInt = { readonly kind: "int"; readonly value: number };

export type OscArgument = number | string | boolean | OscInt;

export function oscInt(value: number): OscInt {
  return { kind: "int", value: Math.trunc(value) };
}

function paddedString(text: string): Buffer {
  const raw = Buffer.from(text, "utf-8");
  // At least one NUL, then pad to a multiple of four.
  const size = Math.ceil((raw.length + 1) / 4) * 4;
  const out = Buffer.alloc(size);
  raw.copy(out);
  return out;
}

function typeTag(arg: OscArgument): string {
  if (typeof arg === "number") return "f";
  if (typeof arg === "string") return "s";
  if (typeof arg === "boolean") return arg ? "T" : "F";
  return "i";
}

function encodeArgument(arg: OscArgument): Buffer | undefined {
  if (typeof arg === "boolean") return undefined;
  if (typeof arg === "string") return paddedString(arg);
  const out = Buffer.alloc(4);
  if (typeof arg === "number") out.writeFloatBE(arg);
  else out.writeInt32BE(arg.value);
  return out;
}

/** Encodes a single OSC 1.0 message (no bundles). */
export function encodeOscMessage(address: string, args: readonly OscArgument[] = []): Buffer {
  if (!address.startsWith("/")) {
    throw new Error(`OSC address must start with "/": ${address}`);
  }
  const parts = [paddedString(address), paddedString("," + args.map(typeTag).join(""))];
  for (const arg of args) {
    const encoded = encodeArgument(arg);
    if (encoded) parts.push(encoded);
  }
  return Buffer.concat(parts);
}
