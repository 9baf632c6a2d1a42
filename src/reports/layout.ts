import { escapeHtml } from './format.js';

const BASE_STYLE = `
        body { font-family: Arial, sans-serif; margin: 20px; background: #f5f5f5; }
        h1 { color: #333; border-bottom: 3px solid #0066cc; padding-bottom: 10px; }
        .summary, .check-section, .property-history {
            background: white;
            padding: 20px;
            margin: 20px 0;
            border-radius: 8px;
            box-shadow: 0 2px 8px rgba(0,0,0,0.1);
        }
        .property {
            background: #fafafa;
            border: 1px solid #ddd;
            padding: 15px;
            margin: 15px 0;
            border-radius: 5px;
            display: flex;
            gap: 15px;
        }
        .property-image { flex-shrink: 0; width: 200px; height: 150px; object-fit: cover; border-radius: 4px; }
        .property-details { flex-grow: 1; }
        .property h3 { margin-top: 0; color: #333; }
        a { color: #0066cc; text-decoration: none; }
        a:hover { text-decoration: underline; }
        .button {
            background: #0066cc;
            color: white;
            padding: 8px 16px;
            border-radius: 3px;
            display: inline-block;
            margin-top: 10px;
            font-size: 14px;
        }
        .description-box {
            margin: 10px 0;
            padding: 10px;
            background: white;
            border-radius: 4px;
            border-left: 3px solid #0066cc;
            max-height: 150px;
            overflow-y: auto;
            line-height: 1.6;
        }
        .timestamp { color: #666; font-size: 0.9em; }`;

export const renderPage = (title: string, heading: string, body: string, extraStyle = ''): string => `<!DOCTYPE html>
<html>
<head>
    <meta charset="utf-8">
    <title>${escapeHtml(title)}</title>
    <style>${BASE_STYLE}${extraStyle}
    </style>
</head>
<body>
    <h1>${escapeHtml(heading)}</h1>
${body}
</body>
</html>
`;

export const renderImage = (src: string | null): string =>
    src ? `<img src="${escapeHtml(src)}" class="property-image" alt="Property photo">` : '';

export const renderTitleLink = (url: string, name: string): string =>
    `<a href="${escapeHtml(url)}" target="_blank">${escapeHtml(name)}</a>`;

export const renderDescription = (description: string | null): string =>
    `<div class="description-box"><strong>Description:</strong><br>${escapeHtml(
        description ?? 'No description available',
    )}</div>`;

export const renderViewButton = (url: string): string =>
    `<a href="${escapeHtml(url)}" class="button" target="_blank">View Property</a>`;
