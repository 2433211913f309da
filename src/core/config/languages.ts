// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0

export interface LanguageDefinition {
  /** BCP 47 tag used for translations, speech recognition and synthesis. */
  code: string;
  displayName: string;
  flag: string;
  greeting: string;
}

export const ALL_LANGUAGES: readonly LanguageDefinition[] = [
  { code: 'en-US', displayName: 'English', flag: '🇺🇸', greeting: "Hello! I'm AgriGuard, your AI Agronomist 🌱" },
  { code: 'hi-IN', displayName: 'हिंदी', flag: '🇮🇳', greeting: 'नमस्ते! मैं एग्रीगार्ड हूं, आपका AI कृषि विशेषज्ञ 🌱' },
  { code: 'es-ES', displayName: 'Español', flag: '🇪🇸', greeting: '¡Hola! Soy AgriGuard, tu Agrónomo IA 🌱' },
  { code: 'fr-FR', displayName: 'Français', flag: '🇫🇷', greeting: 'Bonjour! Je suis AgriGuard, votre Agronome IA 🌱' },
  { code: 'pt-BR', displayName: 'Português', flag: '🇧🇷', greeting: 'Olá! Sou AgriGuard, seu Agrônomo IA 🌱' },
  { code: 'de-DE', displayName: 'Deutsch', flag: '🇩🇪', greeting: 'Hallo! Ich bin AgriGuard, Ihr KI-Agronom 🌱' },
  { code: 'zh-CN', displayName: '中文', flag: '🇨🇳', greeting: '你好！我是AgriGuard，您的AI农艺师 🌱' },
  { code: 'ar-SA', displayName: 'العربية', flag: '🇸🇦', greeting: 'مرحبا! أنا AgriGuard، مهندسك الزراعي AI 🌱' },
  { code: 'bn-IN', displayName: 'বাংলা', flag: '🇮🇳', greeting: 'নমস্কার! আমি এগ্রিগার্ড, আপনার AI কৃষি বিশেষজ্ঞ 🌱' },
  { code: 'ta-IN', displayName: 'தமிழ்', flag: '🇮🇳', greeting: 'வணக்கம்! நான் AgriGuard, உங்கள் AI வேளாண் நிபுணர் 🌱' },
  { code: 'te-IN', displayName: 'తెలుగు', flag: '🇮🇳', greeting: 'నమస్కారం! నేను AgriGuard, మీ AI వ్యవసాయ నిపుణుడు 🌱' },
  { code: 'mr-IN', displayName: 'मराठी', flag: '🇮🇳', greeting: 'नमस्कार! मी AgriGuard, तुमचा AI कृषी तज्ञ 🌱' },
  { code: 'gu-IN', displayName: 'ગુજરાતી', flag: '🇮🇳', greeting: 'નમસ્તે! હું AgriGuard છું, તમારો AI કૃષિ નિષ્ણાત 🌱' },
  { code: 'kn-IN', displayName: 'ಕನ್ನಡ', flag: '🇮🇳', greeting: 'ನಮಸ್ಕಾರ! ನಾನು AgriGuard, ನಿಮ್ಮ AI ಕೃಷಿ ತಜ್ಞ 🌱' },
  { code: 'pa-IN', displayName: 'ਪੰਜਾਬੀ', flag: '🇮🇳', greeting: 'ਸਤ ਸ੍ਰੀ ਅਕਾਲ! ਮੈਂ AgriGuard ਹਾਂ, ਤੁਹਾਡਾ AI ਖੇਤੀ ਮਾਹਰ 🌱' },
];

export const DEFAULT_LANGUAGE_CODE = 'en-US';

export const findLanguage = (code: string): LanguageDefinition | undefined =>
  ALL_LANGUAGES.find(l => l.code === code);
