/**
 * Centralized color constants for consistent embed theming
 */
export const THEME_COLORS = {
  // Estados do sistema
  ERROR: 0xe74c3c, // Vermelho - Erros, falhas
  SUCCESS: 0x2ecc71, // Verde - Sucessos, confirmações
  WARNING: 0xf39c12, // Laranja - Avisos, atenção
  INFO: 0x3498db, // Azul - Informações gerais
  PRIMARY: 0x9b59b6, // Roxo - Ações primárias

  // Categorias funcionais
  MUSIC: 0x1db954, // Verde - Sistema de música
  PLAYLIST: 0x8e44ad, // Roxo escuro - Playlists salvas
  ADMIN: 0xe74c3c, // Vermelho - Comandos administrativos
  GENERAL: 0x9b59b6, // Roxo - Comandos gerais
} as const;

export type ThemeColor = keyof typeof THEME_COLORS;

/**
 * Color utility functions for dynamic color selection
 */
export class ColorUtils {
  /**
   * Get color by command category name
   */
  static getCategoryColor(category: string): number {
    const categoryMap: Record<string, number> = {
      MUSIC: THEME_COLORS.MUSIC,
      PLAYLIST: THEME_COLORS.PLAYLIST,
      ADMIN: THEME_COLORS.ADMIN,
      GENERAL: THEME_COLORS.GENERAL,
    };

    return categoryMap[category.toUpperCase()] ?? THEME_COLORS.INFO;
  }
}
