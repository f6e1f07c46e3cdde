/**
 * X web UI locations and selectors.
 *
 * Selectors use puppeteer's syntax: plain CSS, plus `::-p-xpath(...)` where a
 * match depends on text content.
 */

export const X_BASE_URL = "https://x.com";

export const X_URLS = {
	login: `${X_BASE_URL}/login`,
	home: `${X_BASE_URL}/home`,
	trending: `${X_BASE_URL}/explore/tabs/trending`,
	compose: `${X_BASE_URL}/compose/post`,
	search: (query: string) =>
		`${X_BASE_URL}/search?q=${encodeURIComponent(query)}&src=typed_query&f=live`,
} as const;

export const X_SELECTORS = {
	usernameInput: 'input[name="text"]',
	nextButton: "::-p-xpath(//button[.//span[text()='Next']])",
	passwordInput: 'input[name="password"]',
	loginButton: '[data-testid="LoginForm_Login_Button"]',
	primaryColumn: '[data-testid="primaryColumn"]',
	trend: '[data-testid="trend"]',
	post: 'article[data-testid="tweet"]',
	userNameSpan: '[data-testid="User-Name"] span',
	postText: '[data-testid="tweetText"]',
	statusLink: 'a[href*="/status/"]',
	replyButton: 'article[data-testid="tweet"] [data-testid="reply"]',
	composer: '[data-testid="tweetTextarea_0"]',
	fileInput: 'input[data-testid="fileInput"]',
	submitButton: '[data-testid="tweetButton"]',
} as const;

/** Surface wait budgets. */
export const X_WAITS = {
	page: 20_000,
	replyComposer: 10_000,
} as const;
