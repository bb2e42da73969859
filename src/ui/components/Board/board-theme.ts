export const CELL_SIZE = 72;

export const BOARD_COLORS = {
  light: '#f2efe6',
  dark: '#e3ddcc',
  border: '#6b6455',
  selected: 'rgba(255, 221, 0, 0.55)',
  validMove: 'rgba(39, 174, 96, 0.35)',
  validAttack: 'rgba(231, 76, 60, 0.35)',
};
