export interface Stats {
  attack: number;
  health: number;
}
