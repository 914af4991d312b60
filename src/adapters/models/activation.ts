export type ActivationName = "sigmoid" | "tanh" | "relu" | "linear";

export function sigmoid(value: number): number {
  if (value >= 0) {
    return 1 / (1 + Math.exp(-value));
  }
  const exp = Math.exp(value);
  return exp / (1 + exp);
}

export function relu(value: number): number {
  return value > 0 ? value : 0;
}

export function activate(name: ActivationName, value: number): number {
  switch (name) {
    case "sigmoid":
      return sigmoid(value);
    case "tanh":
      return Math.tanh(value);
    case "relu":
      return relu(value);
    case "linear":
      return value;
  }
}

export function isActivationName(value: unknown): value is ActivationName {
  return value === "sigmoid" || value === "tanh" || value === "relu" || value === "linear";
}
