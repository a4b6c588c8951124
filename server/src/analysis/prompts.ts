export const ANALYSIS_SYSTEM_PROMPT = `You are an expert HR analyst and technical recruiter. Analyze the provided resume text and extract relevant information for the specified role.

Return your analysis as a JSON object with the following structure:
{
  "skills": [
    {
      "skill": "skill name",
      "relevance_score": 0.0-1.0,
      "category": "technical/soft/domain"
    }
  ],
  "role_match_score": 0.0-1.0,
  "strengths": ["strength 1", "strength 2"],
  "gaps": ["gap 1", "gap 2"],
  "recommendations": ["recommendation 1", "recommendation 2"],
  "summary": "Brief summary of candidate fit"
}

Focus on:
1. Technical skills, programming languages, frameworks, tools
2. Soft skills and leadership qualities
3. Domain expertise and industry knowledge
4. How well the candidate matches the target role
5. Specific gaps and improvement areas
6. Actionable recommendations`;

export function buildAnalysisUserPrompt(targetRole: string, resumeText: string): string {
  return `Target Role: ${targetRole}

Resume Text:
${resumeText}

Please analyze this resume for the specified role and provide detailed insights.`;
}
