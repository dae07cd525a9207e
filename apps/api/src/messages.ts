// User-facing texts (Russian). Amount arguments are already formatted "150.00".

export const MESSAGES = {
  qrNotFound:
    "Не удалось распознать QR-код на изображении. Пожалуйста, убедитесь, что фото четкое и содержит QR-код чека.",
  fetchFailed: "Не удалось получить данные чека по QR-коду. Проверьте, что чек действителен.",
  duplicate: "Этот чек уже был обработан ранее.",
  storageError: "Не удалось сохранить чек. Попробуйте отправить его еще раз.",
  stale: (checkDate: string) => `Чек должен быть сегодняшним. Дата чека: ${checkDate}.`,
  quotaExceeded: (limit: number) => `Достигнут лимит чеков на сегодня (${limit}). Попробуйте завтра.`,
  success: (p: { amount: string; cashback: string; total: string }) =>
    "✅ Чек успешно обработан!\n\n" +
    `💰 Сумма чека: ${p.amount} руб.\n` +
    `🎁 Кэшбэк: ${p.cashback} руб.\n` +
    `📊 Ваш общий кэшбэк: ${p.total} руб.\n\n` +
    "Спасибо за покупку!"
} as const;
