import type { Corpus, TitleMetadata } from "../types";

/** Built-in titles used when no source is configured or it cannot be read */
export const DEFAULT_TITLES: readonly string[] = [
    "AI and Blockchain in Supply Chain Management",
    "Machine Learning Applications in Healthcare",
    "Digital Transformation in Banking Sector",
    "Sustainability Practices in Retail Industry",
    "Customer Data Analytics using Python",
    "Impact of Social Media on Consumer Behavior",
    "Smart City Development using IoT and AI",
    "E-commerce Strategies for Small Businesses",
    "Cybersecurity Challenges in Cloud Computing",
    "Automation and Robotics in Manufacturing",
];

export function defaultCorpus(): Corpus<TitleMetadata> {
    return DEFAULT_TITLES.map(title => ({
        title,
        metadata: { extra: { "Project Title": title } },
    }));
}
