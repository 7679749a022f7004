export type OutputContext = {
  // Where .scad files are written.
  scadDir: string;
  // Where renderer outputs and images go.
  renderDir: string;
  executable: string;
  flipChiral: boolean;
};

export const context = (overrides: Partial<OutputContext> = {}): OutputContext => ({
  scadDir: overrides.scadDir ?? "output/scad",
  renderDir: overrides.renderDir ?? "output/render",
  executable: overrides.executable ?? "openscad",
  flipChiral: overrides.flipChiral ?? true,
});

// Degrees to radians, the angle unit of the IR.
export const deg = (degrees: number): number => (degrees * Math.PI) / 180;
