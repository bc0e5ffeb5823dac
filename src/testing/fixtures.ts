/**
 * HTML fixtures shaped like the portal's sign-in and profile pages.
 */

export const TEST_TOKEN = 'test-csrf-token';

export function signInPage(token: string | null = TEST_TOKEN): string {
  const meta = token === null ? '' : `<meta name="csrf-token" content="${token}" />`;
  return `<!DOCTYPE html>
<html>
<head>
  <meta name="csrf-param" content="authenticity_token" />
  ${meta}
  <title>Вход</title>
</head>
<body>
  <form action="/ru/users/sign_in" method="post">
    <input type="text" name="user[login]" />
    <input type="password" name="user[password]" />
  </form>
</body>
</html>`;
}

export const PROFILE_VALUES: Record<string, string> = {
  'Номер зачетки:': '1900001',
  'Форма обучения:': 'Очная',
  'Уровень подготовки:': 'Бакалавриат',
  'Специализация:': 'Программная инженерия',
  'Специальность:': '09.03.01 Информатика и вычислительная техника',
  'Факультет:': 'ИТКН',
  'Курс:': '3',
  'Группа:': 'БИВТ-21-1',
  'Форма финансирования:': 'Бюджет',
  'Общежитие:': 'Нет',
  'Дата окончания:': '30.06.2025',
  'Личная почта:': 'student@example.com',
  'Личный номер телефона:': '+7 (900) 000-00-00',
  'Корпоративная почта:': 'm1900001@edu.misis.ru'
};

export interface ProfilePageOptions {
  /** Heading text; null leaves out the whole name block */
  fullName?: string | null;
  /** Captions to leave out */
  omit?: string[];
  /** Caption/value overrides */
  values?: Record<string, string>;
}

export function profilePage(options: ProfilePageOptions = {}): string {
  const fullName = options.fullName === undefined ? 'Иванов Иван Иванович' : options.fullName;
  const values = { ...PROFILE_VALUES, ...options.values };
  const omit = new Set(options.omit ?? []);

  const nameBlock = fullName === null
    ? ''
    : `<div class="person_name">\n      <h3>  ${fullName}  </h3>\n    </div>`;

  const rows = Object.entries(values)
    .filter(([caption]) => !omit.has(caption))
    .map(([caption, value]) => `      <div class="person__row">
        <span class="person__label">${caption}</span>
        <span class="person__value">
          ${value}
        </span>
      </div>`)
    .join('\n');

  return `<!DOCTYPE html>
<html>
<head><meta name="csrf-token" content="${TEST_TOKEN}" /></head>
<body>
  <div class="person">
    ${nameBlock}
    <div class="person__info">
${rows}
    </div>
  </div>
</body>
</html>`;
}
