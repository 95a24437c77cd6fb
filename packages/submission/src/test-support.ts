import { createTemplateSet, type TemplateSet } from "md2wechat-converter";
import { createLogger, type Logger } from "./logger";

export function createPlainTemplates(): TemplateSet {
    return createTemplateSet({
        contentBlock: "<S>{content}</S>",
        blankLine: "<BL/>",
        divider: "<HR/>",
        heading1: "<H1>Part.{index} {title}</H1>",
        heading2: "<H2>{title}</H2>",
        quote: "<Q>{content}</Q>",
        text: "<T>{content}</T>",
        image: "<IMG/>",
        bannerTop: "<TOP/>",
        bannerBottom: "<BOTTOM/>",
        terminator: "<END/>",
    });
}

export function createSilentLogger(): Logger {
    return createLogger("error", () => undefined);
}
