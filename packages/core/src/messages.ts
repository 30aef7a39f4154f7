// packages/core/src/messages.ts
export const LOCALES = ["en", "fr"] as const;
export type Locale = (typeof LOCALES)[number];

export type Apologies = { error: string; timeout: string; emptyReply: string };

// Only these strings ever reach the user on failure; the real error stays on the message row.
export const APOLOGIES: Record<Locale, Apologies> = {
  en: {
    error: "Sorry, I encountered an error processing your request. Please try again.",
    timeout: "Sorry, the assistant took too long to respond. Please try again.",
    emptyReply: "I apologize, but I couldn't generate a proper response. Please try again.",
  },
  fr: {
    error: "Désolé, une erreur est survenue lors du traitement de votre demande. Veuillez réessayer.",
    timeout: "Désolé, l'assistant a mis trop de temps à répondre. Veuillez réessayer.",
    emptyReply: "Je suis désolé, je n'ai pas pu générer de réponse correcte. Veuillez réessayer.",
  },
};

export function isLocale(v: string): v is Locale {
  return LOCALES.some((l) => l === v);
}
