import { formatRub } from "@qrcashback/shared";

export const TEXTS = {
  welcome:
    "👋 Добро пожаловать в программу лояльности!\n\n" +
    "📸 Отправьте фото QR-кода с чека для получения кэшбэка.\n\n" +
    "Команды:\n" +
    "/balance - ваш баланс кэшбэка\n" +
    "/help - помощь",
  help:
    "📖 Помощь\n\n" +
    "Отправьте фото QR-кода с чека для автоматического начисления кэшбэка.\n\n" +
    "Команды:\n" +
    "/start - начать\n" +
    "/balance - баланс кэшбэка\n" +
    "/help - эта справка",
  fallback: "Пожалуйста, отправьте фото QR-кода с чека или используйте команды /start, /balance, /help",
  sendPhoto: "Пожалуйста, отправьте фото QR-кода с чека.",
  notRegistered: "Вы еще не зарегистрированы. Отправьте фото чека для регистрации.",
  processing: "⏳ Обрабатываю чек...",
  downloadFailed: "❌ Не удалось загрузить изображение. Попробуйте еще раз.",
  notAnImage: "Пожалуйста, отправьте изображение QR-кода с чека.",
  apiUnavailable: "Сервис временно недоступен. Попробуйте позже.",
  balance: (total: string) => `💰 Ваш баланс кэшбэка: ${formatRub(total)} руб.`
} as const;
